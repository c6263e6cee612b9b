/**
 * Replacer compilers for `--replace` (`regex~replacement`) and `--binreplace`
 * (`hexNeedle~hexReplacement`).
 *
 * Both specs split on every `~` and must yield exactly two parts. There is no way
 * to escape a `~`, so a pattern cannot contain one.
 */

import { SPEC_SEPARATOR } from './constants.js';
import type { CompileOptions } from './matcher.js';
import { encodeText, fromByteString, parsePattern, toByteString } from './matcher.js';
import type { UserRegex } from './regex.js';
import type { Replacer } from './types.js';
import { ValidationError } from './validation.js';

const HEX = /^(?:[0-9a-fA-F]{2})*$/;

export interface TextReplaceSpec {
  /** Regex source as written in the spec. */
  source: string;
  pattern: UserRegex;
  replacement: string;
}

export interface BinReplaceSpec {
  needle: Buffer;
  replacement: Buffer;
}

/** Splits `<a>~<b>`; any other number of parts is an error. */
export function splitSpec(spec: string, field: string): [string, string] {
  const parts = spec.split(SPEC_SEPARATOR);
  if (parts.length !== 2) {
    throw new ValidationError(
      `${field} must be in the form <find>${SPEC_SEPARATOR}<replace> (found ${parts.length} part(s))`,
      field
    );
  }
  return [parts[0], parts[1]];
}

/** Strict hex decode: even length, hex digits only. Buffer.from(…, 'hex') would silently truncate. */
export function decodeHex(text: string, field: string): Buffer {
  if (!HEX.test(text)) {
    throw new ValidationError(`${field} is not valid hex: "${text}"`, field);
  }
  return Buffer.from(text, 'hex');
}

/**
 * Replaces every non-overlapping occurrence of needle, scanning left to right.
 * After a match the scan resumes past the whole needle, so `aa` in `aaa` is replaced once.
 * Always returns a new Buffer.
 */
export function replaceBytes(input: Buffer, needle: Buffer, replacement: Buffer): Buffer {
  if (needle.length === 0) {
    throw new RangeError('needle must not be empty');
  }
  const parts: Buffer[] = [];
  let cursor = 0;
  for (;;) {
    const index = input.indexOf(needle, cursor);
    if (index === -1) break;
    parts.push(input.subarray(cursor, index), replacement);
    cursor = index + needle.length;
  }
  parts.push(input.subarray(cursor));
  return Buffer.concat(parts);
}

export function parseReplaceSpec(spec: string): TextReplaceSpec {
  const [source, replacement] = splitSpec(spec, 'replace');
  return { source, pattern: parsePattern(source, 'replace'), replacement };
}

export function parseBinReplaceSpec(spec: string): BinReplaceSpec {
  const [needleHex, replacementHex] = splitSpec(spec, 'binReplace');
  const needle = decodeHex(needleHex, 'needle');
  if (needle.length === 0) {
    throw new ValidationError('needle must not be empty', 'needle');
  }
  return { needle, replacement: decodeHex(replacementHex, 'replacement') };
}

function describeError(err: unknown): { error: string; field?: string } {
  if (err instanceof ValidationError) {
    return err.field ? { error: err.message, field: err.field } : { error: err.message };
  }
  return { error: err instanceof Error ? err.message : String(err) };
}

/**
 * Text replacer. `$1`, `$&` and `$<name>` in the replacement refer to the match;
 * an empty match right after the previous one is not replaced.
 * Returns undefined for an empty spec, or on a malformed one (logged as a warning).
 */
export function compileTextReplacer(spec: string, options: CompileOptions): Replacer | undefined {
  if (spec === '') return undefined;

  const { logger } = options;
  let parsed: TextReplaceSpec;
  try {
    parsed = parseReplaceSpec(spec);
  } catch (err) {
    logger.warn('Invalid replace option', describeError(err));
    return undefined;
  }

  const { source, pattern, replacement } = parsed;
  const byteReplacement = encodeText(replacement);
  logger.info(`Replacing ${source} with ${replacement}`);

  return {
    kind: 'text',
    apply(chunk: Buffer): Buffer {
      return fromByteString(pattern.replace(toByteString(chunk), byteReplacement));
    },
  };
}

/**
 * Exact byte-sequence replacer. Needles split across two chunks are not seen:
 * each chunk is rewritten on its own, as delivered by the socket.
 * Returns undefined for an empty spec, or on a malformed one (logged as a warning).
 */
export function compileBinReplacer(spec: string, options: CompileOptions): Replacer | undefined {
  if (spec === '') return undefined;

  const { logger } = options;
  let parsed: BinReplaceSpec;
  try {
    parsed = parseBinReplaceSpec(spec);
  } catch (err) {
    logger.warn('Invalid binreplace option', describeError(err));
    return undefined;
  }

  const { needle, replacement } = parsed;
  logger.info(`Binary replacing ${needle.toString('hex')} with ${replacement.toString('hex')}`);

  return {
    kind: 'binary',
    apply(chunk: Buffer): Buffer {
      return replaceBytes(chunk, needle, replacement);
    },
  };
}
