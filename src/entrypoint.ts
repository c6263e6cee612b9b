#!/usr/bin/env node
/**
 * CLI entrypoint: parse flags and env, build config, validate, then createProxy and start.
 * SIGTERM/SIGINT stop the proxy (handled by the proxy itself); the process then exits on its own.
 * Exit codes: 0 = success, EXIT_CONFIG (1) = validation/config error, EXIT_RUNTIME (2) = listen failure.
 */

import { parseCliArgs, USAGE } from './args.js';
import type { CliOptions } from './args.js';
import { EXIT_CONFIG, EXIT_RUNTIME } from './constants.js';
import { createLogger } from './logger.js';
import { createProxy } from './proxy.js';
import { validateConfig, ValidationError } from './validation.js';

async function main(): Promise<void> {
  const bootLog = createLogger();

  let cli: CliOptions;
  try {
    cli = parseCliArgs(process.argv.slice(2), process.env);
    validateConfig(cli.config);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    bootLog.error('Invalid config: ' + msg, err instanceof ValidationError && err.field ? { field: err.field } : undefined);
    process.stderr.write(USAGE);
    process.exitCode = EXIT_CONFIG;
    return;
  }

  if (cli.help) {
    process.stdout.write(USAGE);
    return;
  }

  const proxy = createProxy(cli.config);
  try {
    await proxy.start();
  } catch (err) {
    bootLog.error('Proxy start failed', { err: String(err) });
    process.exitCode = EXIT_RUNTIME;
  }
}

main().catch((err) => {
  createLogger().error('Entrypoint failed', { err: String(err) });
  process.exit(EXIT_RUNTIME);
});
