/**
 * Rendering helpers for session logs: traced chunk data and socket endpoints.
 */

import type { Socket } from 'net';
import type { Direction } from './types.js';

/** Lowercase contiguous hex when `hex` is set, otherwise the bytes decoded as UTF-8. */
export function formatChunk(chunk: Buffer, hex: boolean): string {
  return hex ? chunk.toString('hex') : chunk.toString('utf8');
}

/** `>>> 12 bytes sent` / `<<< 12 bytes received`. */
export function formatTransfer(direction: Direction, bytes: number): string {
  return direction === 'sent' ? `>>> ${bytes} bytes sent` : `<<< ${bytes} bytes received`;
}

function formatHostPort(address: string | undefined, port: number | undefined): string {
  if (address === undefined || port === undefined) return '?';
  return address.includes(':') ? `[${address}]:${port}` : `${address}:${port}`;
}

/** Peer address of a connected socket, e.g. `127.0.0.1:52344`. */
export function describeSocket(socket: Pick<Socket, 'remoteAddress' | 'remotePort'>): string {
  return formatHostPort(socket.remoteAddress, socket.remotePort);
}
