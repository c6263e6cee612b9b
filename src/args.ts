/**
 * Command-line and environment parsing into ProxyConfig.
 * Flags win over environment variables; anything unset falls through to validateConfig defaults.
 */

import { parseArgs } from 'util';
import { PROXY_DEFAULTS } from './constants.js';
import type { ProxyConfig } from './types.js';
import { ValidationError } from './validation.js';

export const USAGE = `Usage: tcp-interceptor [options]

  -l, --local <addr>      local address (default "${PROXY_DEFAULTS.localAddr}")
  -r, --remote <addr>     remote address (default "${PROXY_DEFAULTS.remoteAddr}")
  -v                      display server actions; -vv also displays all tcp data
  -n, --nagles            disable Nagle's algorithm
  -h, --hex               output data as hex
      --unwrap-tls        connect to the remote with TLS, exposed unencrypted locally
      --match <regex>     log every match of regex
      --replace <spec>    replace regex, in the form 'regex~replacement'
      --binreplace <spec> replace bytes, in the form '20a4f3~20a500'
      --help              show this help

Environment: LOCAL_ADDR, REMOTE_ADDR, MATCH, REPLACE, BIN_REPLACE, UNWRAP_TLS=1
`;

export interface CliOptions {
  config: ProxyConfig;
  help: boolean;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value !== '' ? value : undefined;
}

function envFlag(value: string | undefined): boolean {
  return value === '1' || value === 'true';
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        local: { type: 'string', short: 'l' },
        remote: { type: 'string', short: 'r' },
        verbose: { type: 'boolean', short: 'v', multiple: true },
        nagles: { type: 'boolean', short: 'n' },
        hex: { type: 'boolean', short: 'h' },
        'unwrap-tls': { type: 'boolean' },
        match: { type: 'string' },
        replace: { type: 'string' },
        binreplace: { type: 'string' },
        help: { type: 'boolean' },
      },
    }).values;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(message, 'argv');
  }
}

/** `-vv` counts as two `-v` flags and turns on very verbose output. */
export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = {}): CliOptions {
  const values = parseFlags(argv);
  const verbosity = values.verbose?.length ?? 0;
  const config: ProxyConfig = {
    localAddr: values.local ?? nonEmpty(env.LOCAL_ADDR),
    remoteAddr: values.remote ?? nonEmpty(env.REMOTE_ADDR),
    verbose: verbosity >= 1,
    veryVerbose: verbosity >= 2,
    noDelay: values.nagles === true,
    outputHex: values.hex === true,
    unwrapTls: values['unwrap-tls'] === true || envFlag(env.UNWRAP_TLS),
    match: values.match ?? env.MATCH ?? '',
    replace: values.replace ?? env.REPLACE ?? '',
    binReplace: values.binreplace ?? env.BIN_REPLACE ?? '',
  };

  return { config, help: values.help === true };
}
