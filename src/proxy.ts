/**
 * Proxy instance and createProxy: the listener that turns every accepted
 * connection into a Session bound to the shared, precompiled pipeline.
 * Public API: createProxy(config), proxy.start(), proxy.stop(), proxy.isRunning(), proxy.address().
 */

import { createServer } from 'net';
import type { Server, Socket } from 'net';
import { EXIT_RUNTIME, VERSION } from './constants.js';
import { Counter } from './counter.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { compilePipeline } from './pipeline.js';
import type { Pipeline } from './pipeline.js';
import { Session } from './session.js';
import { createTcpDialer, createTlsDialer } from './transport.js';
import type { Dialer } from './transport.js';
import type { Endpoint, ProxyConfig, ResolvedConfig } from './types.js';
import { formatEndpoint, validateConfig } from './validation.js';

export interface Proxy {
  start(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
  /** Bound listen address once started (useful with port 0), otherwise null. */
  address(): Endpoint | null;
  /** Number of sessions currently open. */
  activeSessions(): number;
}

export interface ProxyDeps {
  /** Root logger. Default: JSON lines with verbosity taken from the config. */
  logger?: Logger;
  /** Remote connector. Default: TCP, or TLS when unwrapTls is set. */
  dialer?: Dialer;
}

function listen(server: Server, local: Endpoint): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen({ port: local.port, host: local.host === '' ? undefined : local.host }, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Creates a proxy instance. Config is validated on start(), not on create.
 * Match/replace specs are compiled once in start(); malformed ones are logged
 * as warnings and leave that stage disabled.
 */
export function createProxy(config: ProxyConfig, deps: ProxyDeps = {}): Proxy {
  let logger: Logger = deps.logger ?? createLogger();
  let server: Server | null = null;
  let running = false;
  let signalHandlersAttached = false;
  const sessions = new Set<Session>();
  const connectionIds = new Counter();
  const matchIds = new Counter();

  const onSignal = (): void => {
    logger.info('Received signal, stopping proxy');
    proxy.stop().catch((err: unknown) => {
      logger.error('Error during stop', { error: err instanceof Error ? err.message : String(err) });
      process.exitCode = EXIT_RUNTIME;
    });
  };

  function attachSignalHandlers(): void {
    if (signalHandlersAttached) return;
    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);
    signalHandlersAttached = true;
  }

  function detachSignalHandlers(): void {
    if (!signalHandlersAttached) return;
    process.off('SIGTERM', onSignal);
    process.off('SIGINT', onSignal);
    signalHandlersAttached = false;
  }

  function accept(socket: Socket, resolved: ResolvedConfig, pipeline: Pipeline, dialer: Dialer): void {
    const id = connectionIds.next();
    const log = logger.child({ connection: id });
    if (resolved.unwrapTls) {
      log.info('Unwrapping TLS');
    }

    const session = new Session({
      id,
      local: socket,
      dialer,
      pipeline,
      logger: log,
      noDelay: resolved.noDelay,
      outputHex: resolved.outputHex,
    });
    sessions.add(session);

    // detached: the listener goes straight back to accepting
    void session.start().then(
      () => {
        sessions.delete(session);
      },
      (err: unknown) => {
        sessions.delete(session);
        log.error('Session failed', { error: err instanceof Error ? err.message : String(err) });
      }
    );
  }

  const proxy: Proxy = {
    async start(): Promise<void> {
      if (running) {
        throw new Error('Proxy already running');
      }
      const resolved = validateConfig(config);
      if (!deps.logger) {
        logger = createLogger({ verbose: resolved.verbose, veryVerbose: resolved.veryVerbose });
      }
      logger.info(
        `tcp-interceptor (${VERSION}) proxying from ${formatEndpoint(resolved.local)} to ${formatEndpoint(resolved.remote)}`
      );

      const pipeline = compilePipeline(resolved, { logger, matchCounter: matchIds });
      const dialer =
        deps.dialer ?? (resolved.unwrapTls ? createTlsDialer(resolved.remote) : createTcpDialer(resolved.remote));

      const srv = createServer((socket) => accept(socket, resolved, pipeline, dialer));
      try {
        await listen(srv, resolved.local);
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        logger.error('Failed to open local port to listen', { error: message });
        throw e;
      }
      srv.on('error', (err) => {
        logger.warn('Failed to accept connection', { error: err.message });
      });

      server = srv;
      running = true;
      attachSignalHandlers();
    },

    async stop(): Promise<void> {
      if (!running || server === null) {
        detachSignalHandlers();
        return;
      }
      running = false;
      const srv = server;
      server = null;
      logger.info('Stopping proxy', { sessions: sessions.size });
      const closed = closeServer(srv);
      for (const session of sessions) {
        session.close();
      }
      await closed;
      detachSignalHandlers();
      logger.info('Proxy stopped');
    },

    isRunning(): boolean {
      return running;
    },

    address(): Endpoint | null {
      const addr = server?.address();
      if (addr == null || typeof addr === 'string') return null;
      return { host: addr.address, port: addr.port };
    },

    activeSessions(): number {
      return sessions.size;
    },
  };

  return proxy;
}
