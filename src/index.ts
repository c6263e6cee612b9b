/**
 * TCP interceptor: library entry.
 * A TCP proxy that runs a match/replace pipeline over the bytes of each session.
 */

export { createProxy } from './proxy.js';
export type { Proxy, ProxyDeps } from './proxy.js';

export { Session } from './session.js';
export type { SessionOptions } from './session.js';

export { createTcpDialer, createTlsDialer } from './transport.js';
export type { Dialer, TlsDialer, TlsDialerOptions } from './transport.js';

export { compilePipeline, createPipeline } from './pipeline.js';
export type { Pipeline, PipelineSpecs, PipelineStages } from './pipeline.js';

export { expandTemplate, UserRegex } from './regex.js';
export type { RegexMatch } from './regex.js';

export { compileMatcher, parsePattern } from './matcher.js';
export type { CompileOptions } from './matcher.js';

export {
  compileBinReplacer,
  compileTextReplacer,
  decodeHex,
  parseBinReplaceSpec,
  parseReplaceSpec,
  replaceBytes,
  splitSpec,
} from './replacer.js';
export type { BinReplaceSpec, TextReplaceSpec } from './replacer.js';

export { Counter } from './counter.js';
export { createLogger, createMemoryLogger } from './logger.js';
export type { LogLevel, Logger, LoggerOptions, LogRecord, LogSink } from './logger.js';

export { parseCliArgs } from './args.js';
export type { CliOptions } from './args.js';

export {
  MAX_PORT,
  MIN_LOCAL_PORT,
  MIN_PORT,
  PROXY_DEFAULTS,
  SPEC_SEPARATOR,
} from './constants.js';

export type {
  Direction,
  Endpoint,
  MatchEvent,
  Matcher,
  ProxyConfig,
  Replacer,
  ResolvedConfig,
  SessionStats,
} from './types.js';

export { formatEndpoint, parseAddress, validateConfig, ValidationError } from './validation.js';
