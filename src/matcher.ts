/**
 * Pattern compiler: turns a `--match` regex into a Matcher that logs every match
 * found in a chunk with a process-wide sequence number.
 *
 * Regexes run over a latin1 view of the bytes (one UTF-16 code unit per byte), so
 * offsets are byte offsets and a replaced chunk converts back without loss.
 */

import { Counter } from './counter.js';
import type { Logger } from './logger.js';
import { UserRegex } from './regex.js';
import type { MatchEvent, Matcher } from './types.js';

export interface CompileOptions {
  logger: Logger;
  /** Shared across matchers so ids stay unique; a fresh counter when omitted. */
  matchCounter?: Counter;
}

/** Bytes as a string of code units 0x00–0xFF. */
export function toByteString(chunk: Buffer): string {
  return chunk.toString('latin1');
}

export function fromByteString(text: string): Buffer {
  return Buffer.from(text, 'latin1');
}

/** UTF-8 encodes user text and returns it in the byte-string view. */
export function encodeText(text: string): string {
  return Buffer.from(text, 'utf8').toString('latin1');
}

/** Compiles a regex source for use over byte strings. Throws ValidationError tagged with field. */
export function parsePattern(source: string, field = 'match'): UserRegex {
  return new UserRegex(encodeText(source), field);
}

export function findAll(pattern: UserRegex, chunk: Buffer): Array<{ index: number; bytes: Buffer }> {
  return pattern.scan(toByteString(chunk)).map(({ index, end }) => ({ index, bytes: chunk.subarray(index, end) }));
}

/**
 * Returns undefined for an empty spec, or when the regex is invalid (logged as a warning).
 * The returned matcher copies matched bytes out of the chunk, so events outlive it.
 */
export function compileMatcher(spec: string, options: CompileOptions): Matcher | undefined {
  if (spec === '') return undefined;

  const { logger } = options;
  let pattern: UserRegex;
  try {
    pattern = parsePattern(spec, 'match');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn('Invalid match regex', { error: message });
    return undefined;
  }

  const counter = options.matchCounter ?? new Counter();
  logger.info(`Matching ${spec}`);

  return {
    source: spec,
    observe(chunk: Buffer): MatchEvent[] {
      return findAll(pattern, chunk).map(({ index, bytes }) => {
        const id = counter.next();
        const text = bytes.toString('utf8');
        logger.info(`Match #${id}: ${text}`, { match: id });
        return { id, index, bytes: Buffer.from(bytes), text };
      });
    },
  };
}
