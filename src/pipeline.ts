/**
 * Match/replace hook contract: what a session runs on every chunk it reads,
 * in either direction, before writing the result to the other socket.
 */

import type { CompileOptions } from './matcher.js';
import { compileMatcher } from './matcher.js';
import { compileBinReplacer, compileTextReplacer } from './replacer.js';
import type { Matcher, Replacer } from './types.js';

export interface PipelineStages {
  matcher?: Matcher;
  replacer?: Replacer;
}

export interface PipelineSpecs {
  match?: string;
  replace?: string;
  binReplace?: string;
}

export interface Pipeline {
  readonly matcher: Matcher | undefined;
  readonly replacer: Replacer | undefined;
  /**
   * Runs the matcher (observation only), then the replacer.
   * Returns the bytes to forward: the replacer's output, or the chunk itself when none is set.
   */
  process(chunk: Buffer): Buffer;
}

export function createPipeline(stages: PipelineStages = {}): Pipeline {
  const { matcher, replacer } = stages;
  return {
    matcher,
    replacer,
    process(chunk: Buffer): Buffer {
      matcher?.observe(chunk);
      return replacer ? replacer.apply(chunk) : chunk;
    },
  };
}

/**
 * Compiles all stages once at startup. Only one replacer can be active:
 * a non-empty binReplace wins over replace, which is then not compiled.
 */
export function compilePipeline(specs: PipelineSpecs, options: CompileOptions): Pipeline {
  const match = specs.match ?? '';
  const replace = specs.replace ?? '';
  const binReplace = specs.binReplace ?? '';

  const matcher = compileMatcher(match, options);

  let replacer: Replacer | undefined;
  if (binReplace !== '') {
    if (replace !== '') {
      options.logger.warn('Both replace and binreplace given; binreplace takes precedence', {
        ignored: replace,
      });
    }
    replacer = compileBinReplacer(binReplace, options);
  } else {
    replacer = compileTextReplacer(replace, options);
  }

  return createPipeline({ matcher, replacer });
}
