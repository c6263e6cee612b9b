/**
 * createProxy, start/stop/isRunning, and end-to-end forwarding through a real
 * listener to an in-process echo upstream.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { connect, createServer } from 'node:net';
import type { Socket } from 'node:net';
import { createMemoryLogger } from './logger.js';
import { createProxy } from './proxy.js';
import type { Proxy } from './proxy.js';
import { createTcpDialer } from './transport.js';

interface Echo {
  port: number;
  received: Buffer[];
  close: () => Promise<void>;
}

async function startEcho(): Promise<Echo> {
  const received: Buffer[] = [];
  const sockets = new Set<Socket>();
  const server = createServer((socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    socket.on('error', () => socket.destroy());
    socket.on('data', (chunk: Buffer) => {
      received.push(chunk);
      socket.write(chunk);
    });
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const addr = server.address();
  assert.ok(addr !== null && typeof addr === 'object');
  return {
    port: addr.port,
    received,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      }),
  };
}

function listenPort(proxy: Proxy): number {
  const addr = proxy.address();
  assert.ok(addr);
  return addr.port;
}

/** Connects, sends data, and resolves with the first n bytes echoed back. */
async function roundTrip(port: number, data: string | Buffer, n: number): Promise<{ client: Socket; reply: Buffer }> {
  const client = connect(port, '127.0.0.1');
  client.on('error', () => client.destroy());
  await new Promise<void>((resolve) => client.once('connect', () => resolve()));
  const reply = new Promise<Buffer>((resolve) => {
    const chunks: Buffer[] = [];
    let length = 0;
    const onData = (chunk: Buffer): void => {
      chunks.push(chunk);
      length += chunk.length;
      if (length >= n) {
        client.off('data', onData);
        resolve(Buffer.concat(chunks));
      }
    };
    client.on('data', onData);
  });
  client.write(data);
  return { client, reply: await reply };
}

function closed(socket: Socket): Promise<void> {
  if (socket.closed) return Promise.resolve();
  return new Promise((resolve) => socket.once('close', () => resolve()));
}

describe('createProxy', () => {
  it('returns a Proxy with start, stop, isRunning', () => {
    const proxy = createProxy({});
    assert.equal(typeof proxy.start, 'function');
    assert.equal(typeof proxy.stop, 'function');
    assert.equal(typeof proxy.isRunning, 'function');
    assert.equal(proxy.isRunning(), false);
    assert.equal(proxy.address(), null);
    assert.equal(proxy.activeSessions(), 0);
  });
});

describe('Proxy lifecycle', () => {
  it('start() then isRunning() is true, stop() then isRunning() is false', async () => {
    const logger = createMemoryLogger();
    const proxy = createProxy({ localAddr: '127.0.0.1:0', remoteAddr: '127.0.0.1:9' }, { logger });
    await proxy.start();
    try {
      assert.equal(proxy.isRunning(), true);
      assert.ok(listenPort(proxy) > 0);
      assert.equal(logger.records[0].message, 'tcp-interceptor (0.1.0) proxying from 127.0.0.1:0 to 127.0.0.1:9');
    } finally {
      await proxy.stop();
    }
    assert.equal(proxy.isRunning(), false);
    assert.equal(proxy.address(), null);
    assert.deepEqual(
      logger.records.slice(-2).map((r) => r.message),
      ['Stopping proxy', 'Proxy stopped']
    );
  });

  it('stop() when not running is safe', async () => {
    const proxy = createProxy({}, { logger: createMemoryLogger() });
    await proxy.stop();
    await proxy.stop();
    assert.equal(proxy.isRunning(), false);
  });

  it('start() rejects when config is invalid', async () => {
    const proxy = createProxy({ remoteAddr: 'nohostport' }, { logger: createMemoryLogger() });
    await assert.rejects(proxy.start(), /remoteAddr/);
    assert.equal(proxy.isRunning(), false);
  });

  it('start() rejects when already running', async () => {
    const proxy = createProxy({ localAddr: '127.0.0.1:0' }, { logger: createMemoryLogger() });
    await proxy.start();
    try {
      await assert.rejects(proxy.start(), /Proxy already running/);
    } finally {
      await proxy.stop();
    }
  });

  it('start() rejects and logs when the local port is taken', async () => {
    const first = createProxy({ localAddr: '127.0.0.1:0' }, { logger: createMemoryLogger() });
    await first.start();
    const logger = createMemoryLogger();
    const second = createProxy({ localAddr: `127.0.0.1:${listenPort(first)}` }, { logger });
    try {
      await assert.rejects(second.start(), /EADDRINUSE/);
      assert.equal(second.isRunning(), false);
      const error = logger.records.find((r) => r.level === 'error');
      assert.ok(error);
      assert.equal(error.message, 'Failed to open local port to listen');
    } finally {
      await first.stop();
    }
  });
});

describe('Proxy forwarding', () => {
  it('passes bytes through unchanged without match or replace', async () => {
    const echo = await startEcho();
    const proxy = createProxy(
      { localAddr: '127.0.0.1:0', remoteAddr: `127.0.0.1:${echo.port}` },
      { logger: createMemoryLogger() }
    );
    await proxy.start();
    try {
      const { client, reply } = await roundTrip(listenPort(proxy), 'hello', 5);
      assert.equal(reply.toString(), 'hello');
      assert.equal(Buffer.concat(echo.received).toString(), 'hello');
      client.destroy();
    } finally {
      await proxy.stop();
      await echo.close();
    }
  });

  it('applies a text replacement to both directions', async () => {
    const echo = await startEcho();
    const proxy = createProxy(
      { localAddr: '127.0.0.1:0', remoteAddr: `127.0.0.1:${echo.port}`, replace: 'foo~bar' },
      { logger: createMemoryLogger() }
    );
    await proxy.start();
    try {
      const { client, reply } = await roundTrip(listenPort(proxy), 'foofoo baz', 10);
      assert.equal(Buffer.concat(echo.received).toString(), 'barbar baz');
      assert.equal(reply.toString(), 'barbar baz');
      client.destroy();
    } finally {
      await proxy.stop();
      await echo.close();
    }
  });

  it('applies a binary replacement, preferring it over a text one', async () => {
    const echo = await startEcho();
    const logger = createMemoryLogger();
    const proxy = createProxy(
      {
        localAddr: '127.0.0.1:0',
        remoteAddr: `127.0.0.1:${echo.port}`,
        replace: 'x~y',
        binReplace: 'ff~00',
      },
      { logger }
    );
    await proxy.start();
    try {
      const { client, reply } = await roundTrip(listenPort(proxy), Buffer.from([0x01, 0xff, 0x02]), 3);
      assert.deepEqual([...Buffer.concat(echo.received)], [0x01, 0x00, 0x02]);
      assert.deepEqual([...reply], [0x01, 0x00, 0x02]);
      assert.ok(logger.records.some((r) => r.level === 'warn' && r.ignored === 'x~y'));
      client.destroy();
    } finally {
      await proxy.stop();
      await echo.close();
    }
  });

  it('numbers connections and matches across sessions', async () => {
    const echo = await startEcho();
    const logger = createMemoryLogger();
    const proxy = createProxy(
      { localAddr: '127.0.0.1:0', remoteAddr: `127.0.0.1:${echo.port}`, match: '\\d+' },
      { logger }
    );
    await proxy.start();
    try {
      const port = listenPort(proxy);
      const a = await roundTrip(port, 'a1', 2);
      a.client.end();
      await closed(a.client);
      const b = await roundTrip(port, 'b22', 3);
      b.client.end();
      await closed(b.client);

      const matches = logger.records.filter((r) => typeof r.match === 'number');
      assert.deepEqual(
        matches.map((r) => r.match),
        [1, 2, 3, 4]
      );
      assert.deepEqual(
        matches.map((r) => r.message),
        ['Match #1: 1', 'Match #2: 1', 'Match #3: 22', 'Match #4: 22']
      );
      const opened = logger.records.filter((r) => r.message.startsWith('Opened '));
      assert.deepEqual(
        opened.map((r) => r.connection),
        [1, 2]
      );
    } finally {
      await proxy.stop();
      await echo.close();
    }
  });

  it('stop() closes live sessions', async () => {
    const echo = await startEcho();
    const proxy = createProxy(
      { localAddr: '127.0.0.1:0', remoteAddr: `127.0.0.1:${echo.port}` },
      { logger: createMemoryLogger() }
    );
    await proxy.start();
    try {
      const { client } = await roundTrip(listenPort(proxy), 'ping', 4);
      assert.equal(proxy.activeSessions(), 1);
      await proxy.stop();
      await closed(client);
      assert.equal(proxy.isRunning(), false);
    } finally {
      await proxy.stop();
      await echo.close();
    }
  });

  it('logs TLS unwrapping per connection and dials through the given dialer', async () => {
    const echo = await startEcho();
    const logger = createMemoryLogger();
    const proxy = createProxy(
      { localAddr: '127.0.0.1:0', remoteAddr: 'example.test:443', unwrapTls: true },
      { logger, dialer: createTcpDialer({ host: '127.0.0.1', port: echo.port }) }
    );
    await proxy.start();
    try {
      const { client, reply } = await roundTrip(listenPort(proxy), 'plain', 5);
      assert.equal(reply.toString(), 'plain');
      const unwrap = logger.records.find((r) => r.message === 'Unwrapping TLS');
      assert.ok(unwrap);
      assert.equal(unwrap.connection, 1);
      client.destroy();
    } finally {
      await proxy.stop();
      await echo.close();
    }
  });
});
