/**
 * Shared shapes: configuration, endpoints, and the Matcher/Replacer capabilities
 * that sessions invoke on every chunk.
 */

// --- Configuration ---

/** User-facing config for createProxy(); every field is optional. */
export interface ProxyConfig {
  /** Listen address, `host:port`, `:port` or `[ipv6]:port`. Default ":9999". */
  localAddr?: string;
  /** Address every accepted connection is forwarded to. Default "localhost:80". */
  remoteAddr?: string;
  /** Log session open/close and per-chunk byte counts. */
  verbose?: boolean;
  /** Also log the data of every chunk. Implies verbose. */
  veryVerbose?: boolean;
  /** Disable Nagle's algorithm on both sockets of each session. */
  noDelay?: boolean;
  /** Render traced data as hex instead of text. */
  outputHex?: boolean;
  /** Connect to the remote over TLS and expose the plaintext locally. */
  unwrapTls?: boolean;
  /** Regex whose matches are logged. Empty disables matching. */
  match?: string;
  /** `<regex>~<replacement>`. Empty disables text replacement. */
  replace?: string;
  /** `<hexNeedle>~<hexReplacement>`. Takes precedence over `replace`. */
  binReplace?: string;
}

export interface Endpoint {
  /** Empty string means all interfaces (listen side only). */
  host: string;
  port: number;
}

/** Normalized config; validateConfig() fills in every default. */
export interface ResolvedConfig {
  local: Endpoint;
  remote: Endpoint;
  verbose: boolean;
  veryVerbose: boolean;
  noDelay: boolean;
  outputHex: boolean;
  unwrapTls: boolean;
  match: string;
  replace: string;
  binReplace: string;
}

// --- Pipeline stages ---

export interface MatchEvent {
  /** Process-wide match sequence number. */
  id: number;
  /** Byte offset of the match within the observed chunk. */
  index: number;
  bytes: Buffer;
  /** The matched bytes decoded as UTF-8. */
  text: string;
}

/** Observes a chunk and reports regex matches. Never mutates its input. */
export interface Matcher {
  readonly source: string;
  observe(chunk: Buffer): MatchEvent[];
}

/** Produces a transformed copy of a chunk. */
export interface Replacer {
  readonly kind: 'text' | 'binary';
  apply(chunk: Buffer): Buffer;
}

// --- Sessions ---

export type Direction = 'sent' | 'received';

export interface SessionStats {
  /** Bytes written to the remote (client → remote). */
  sent: number;
  /** Bytes written to the client (remote → client). */
  received: number;
}
