/**
 * Config validation and normalization.
 * Address and port problems are fatal; createProxy().start() surfaces them as ValidationError.
 */

import {
  DEFAULT_REMOTE_HOST,
  MAX_PORT,
  MIN_LOCAL_PORT,
  MIN_PORT,
  PROXY_DEFAULTS,
} from './constants.js';
import type { Endpoint, ProxyConfig, ResolvedConfig } from './types.js';

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

function assert(condition: boolean, message: string, field?: string): asserts condition {
  if (!condition) {
    throw new ValidationError(message, field);
  }
}

/**
 * Parses `host:port`, `:port` or `[ipv6]:port`. The port must be decimal digits.
 * Range checks are left to the caller since local and remote bounds differ.
 */
export function parseAddress(addr: string, field: string): Endpoint {
  const sep = addr.lastIndexOf(':');
  assert(sep !== -1, `${field} must be in the form host:port (got "${addr}")`, field);

  let host = addr.slice(0, sep);
  const portText = addr.slice(sep + 1);

  if (host.startsWith('[')) {
    assert(host.endsWith(']'), `${field} has an unterminated IPv6 bracket (got "${addr}")`, field);
    host = host.slice(1, -1);
  } else {
    assert(!host.includes(':'), `${field} IPv6 hosts must be bracketed, e.g. [::1]:80 (got "${addr}")`, field);
  }

  assert(/^\d+$/.test(portText), `${field} port must be a number (got "${portText}")`, field);
  return { host, port: parseInt(portText, 10) };
}

/** Renders an endpoint back into `host:port` form. */
export function formatEndpoint(endpoint: Endpoint): string {
  const host = endpoint.host.includes(':') ? `[${endpoint.host}]` : endpoint.host;
  return `${host}:${endpoint.port}`;
}

function optionalString(value: unknown, field: string): string {
  if (value === undefined) return '';
  assert(typeof value === 'string', `${field} must be a string`, field);
  return value;
}

function optionalBoolean(value: unknown, field: string): boolean {
  if (value === undefined) return false;
  assert(typeof value === 'boolean', `${field} must be a boolean`, field);
  return value;
}

/**
 * Validates and normalizes user config into ResolvedConfig.
 * Throws ValidationError with a clear message (and field) on invalid config.
 * Pipeline specifications are only type-checked here; their syntax errors are
 * reported as warnings when the pipeline is compiled.
 */
export function validateConfig(config: ProxyConfig): ResolvedConfig {
  assert(config != null && typeof config === 'object', 'config must be an object');

  const localAddr = config.localAddr !== undefined ? config.localAddr : PROXY_DEFAULTS.localAddr;
  assert(typeof localAddr === 'string', 'localAddr must be a string', 'localAddr');
  const local = parseAddress(localAddr, 'localAddr');
  assert(
    Number.isInteger(local.port) && local.port >= MIN_LOCAL_PORT && local.port <= MAX_PORT,
    `localAddr port must be an integer between ${MIN_LOCAL_PORT} and ${MAX_PORT}`,
    'localAddr'
  );

  const remoteAddr = config.remoteAddr !== undefined ? config.remoteAddr : PROXY_DEFAULTS.remoteAddr;
  assert(typeof remoteAddr === 'string', 'remoteAddr must be a string', 'remoteAddr');
  const remote = parseAddress(remoteAddr, 'remoteAddr');
  assert(
    Number.isInteger(remote.port) && remote.port >= MIN_PORT && remote.port <= MAX_PORT,
    `remoteAddr port must be an integer between ${MIN_PORT} and ${MAX_PORT}`,
    'remoteAddr'
  );
  if (remote.host === '') {
    remote.host = DEFAULT_REMOTE_HOST;
  }

  const veryVerbose = optionalBoolean(config.veryVerbose, 'veryVerbose');

  return {
    local,
    remote,
    verbose: veryVerbose || optionalBoolean(config.verbose, 'verbose'),
    veryVerbose,
    noDelay: optionalBoolean(config.noDelay, 'noDelay'),
    outputHex: optionalBoolean(config.outputHex, 'outputHex'),
    unwrapTls: optionalBoolean(config.unwrapTls, 'unwrapTls'),
    match: optionalString(config.match, 'match'),
    replace: optionalString(config.replace, 'replace'),
    binReplace: optionalString(config.binReplace, 'binReplace'),
  };
}
