/** Exit code: configuration or validation error (bad address, bad port, unknown flag). */
export const EXIT_CONFIG = 1;
/** Exit code: runtime fatal error (listen failed, or error during stop). */
export const EXIT_RUNTIME = 2;

export const VERSION = '0.1.0';

/** Defaults applied by validateConfig when a field is omitted. */
export const PROXY_DEFAULTS = {
  localAddr: ':9999',
  remoteAddr: 'localhost:80',
} as const;

/** Host used when the remote address omits one (":80"). */
export const DEFAULT_REMOTE_HOST = 'localhost';

/** Separates the two halves of a replace specification: `<find>~<replace>`. */
export const SPEC_SEPARATOR = '~';

export const MIN_PORT = 1;
export const MAX_PORT = 65_535;
/** Local port 0 asks the OS for an ephemeral port. */
export const MIN_LOCAL_PORT = 0;

/** Socket error codes that mean the peer went away; not worth a warning. */
export const QUIET_SOCKET_ERRORS: ReadonlySet<string> = new Set(['ECONNRESET', 'EPIPE']);
