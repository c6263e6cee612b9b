/**
 * One proxied connection: dials the remote, then shuttles bytes both ways,
 * running the pipeline on every chunk and forwarding what it returns.
 * Either side ending or failing ends the whole session.
 */

import type { Socket } from 'net';
import { QUIET_SOCKET_ERRORS } from './constants.js';
import type { Logger } from './logger.js';
import { describeSocket, formatChunk, formatTransfer } from './output.js';
import type { Pipeline } from './pipeline.js';
import type { Dialer } from './transport.js';
import type { Direction, SessionStats } from './types.js';

export interface SessionOptions {
  id: number;
  /** Accepted client socket. */
  local: Socket;
  dialer: Dialer;
  /** Shared, read-only; compiled once at startup. */
  pipeline: Pipeline;
  /** Per-connection logger (carries the connection id). */
  logger: Logger;
  noDelay?: boolean;
  outputHex?: boolean;
}

function onceClosed(socket: Socket): Promise<void> {
  if (socket.closed) return Promise.resolve();
  return new Promise((resolve) => socket.once('close', () => resolve()));
}

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

export class Session {
  readonly id: number;
  private readonly stats: SessionStats = { sent: 0, received: 0 };
  private remote: Socket | null = null;
  private closed = false;

  constructor(private readonly options: SessionOptions) {
    this.id = options.id;
  }

  /** Bytes forwarded so far. */
  get bytes(): SessionStats {
    return { ...this.stats };
  }

  /**
   * Runs the session to completion. Resolves (never rejects) once both sockets
   * have closed, with the byte counts written in each direction.
   */
  async start(): Promise<SessionStats> {
    const { local, dialer, logger, noDelay } = this.options;
    const localClosed = onceClosed(local);
    local.on('error', (err) => this.onSocketError(err));

    let remote: Socket;
    try {
      remote = await dialer.dial();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn('Remote connection failed', { error: message, remote: dialer.description });
      local.destroy();
      await localClosed;
      return this.bytes;
    }

    this.remote = remote;
    const remoteClosed = onceClosed(remote);
    remote.on('error', (err) => this.onSocketError(err));

    if (this.closed || local.destroyed) {
      // client left (or stop() ran) while the remote was dialing
      this.close();
    } else {
      if (noDelay) {
        local.setNoDelay(true);
        remote.setNoDelay(true);
      }
      logger.info(`Opened ${describeSocket(local)} >>> ${dialer.description}`);
      this.pipe(local, remote, 'sent');
      this.pipe(remote, local, 'received');
    }

    await Promise.all([localClosed, remoteClosed]);
    logger.info(`Closed (${this.stats.sent} bytes sent, ${this.stats.received} bytes received)`);
    return this.bytes;
  }

  /** Destroys both sockets; start() then resolves. */
  close(): void {
    this.closed = true;
    this.options.local.destroy();
    this.remote?.destroy();
  }

  private pipe(src: Socket, dst: Socket, direction: Direction): void {
    const { pipeline, logger, outputHex = false } = this.options;

    src.on('data', (chunk: Buffer) => {
      const out = pipeline.process(chunk);
      logger.debug(formatTransfer(direction, chunk.length));
      logger.trace(formatChunk(out, outputHex));

      if (dst.destroyed || dst.writableEnded) return;
      this.stats[direction] += out.length;
      if (!dst.write(out)) {
        src.pause();
        dst.once('drain', () => src.resume());
      }
    });

    src.on('end', () => {
      if (!dst.writableEnded) dst.end();
    });
  }

  private onSocketError(err: Error): void {
    const code = errorCode(err);
    if (code === undefined || !QUIET_SOCKET_ERRORS.has(code)) {
      this.options.logger.warn('Read failed', code === undefined ? { error: err.message } : { error: err.message, code });
    }
    this.close();
  }
}
