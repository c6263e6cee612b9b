/**
 * Remote side of a session. A Dialer opens one connection to the configured
 * remote per accepted client; the session only needs a connected Socket back.
 */

import { connect as netConnect, isIP } from 'net';
import type { Socket } from 'net';
import { connect as tlsConnect } from 'tls';
import type { Endpoint } from './types.js';
import { formatEndpoint } from './validation.js';

export interface Dialer {
  /** Human-readable target, e.g. `tls://example.com:443`. */
  readonly description: string;
  /** Resolves once the connection (and TLS handshake, if any) is established. */
  dial(): Promise<Socket>;
}

export interface TlsDialer extends Dialer {
  /** Name sent as SNI and checked against the certificate; undefined for an IP literal. */
  readonly servername: string | undefined;
}

export interface TlsDialerOptions {
  /** SNI and certificate host name. Default: the remote host unless it is an IP literal. */
  servername?: string;
}

function waitFor(socket: Socket, readyEvent: 'connect' | 'secureConnect'): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      socket.destroy();
      reject(err);
    };
    socket.once('error', onError);
    socket.once(readyEvent, () => {
      socket.off('error', onError);
      resolve(socket);
    });
  });
}

/** Plain TCP connection to the remote. */
export function createTcpDialer(remote: Endpoint): Dialer {
  return {
    description: `tcp://${formatEndpoint(remote)}`,
    dial(): Promise<Socket> {
      return waitFor(netConnect({ host: remote.host, port: remote.port }), 'connect');
    },
  };
}

/**
 * TLS connection to the remote; the local side stays plaintext so the pipeline
 * sees decrypted bytes. Certificates are verified with Node's defaults.
 */
export function createTlsDialer(remote: Endpoint, options: TlsDialerOptions = {}): TlsDialer {
  const servername = options.servername ?? (isIP(remote.host) === 0 ? remote.host : undefined);
  return {
    description: `tls://${formatEndpoint(remote)}`,
    servername,
    dial(): Promise<Socket> {
      return waitFor(tlsConnect({ host: remote.host, port: remote.port, servername }), 'secureConnect');
    },
  };
}
