import type { AddressInfo } from 'node:net';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WebSocketServer, type WebSocket } from 'ws';
import { TransportFaultError } from '../src/errors.js';
import type { TransportConnection, TransportHandlers } from '../src/transport/Transport.js';
import { WebSocketConnector } from '../src/transport/WebSocketTransport.js';

// ============ Test Helpers ============

interface RecordingHandlers extends TransportHandlers {
  readonly received: string[];
  readonly closes: number[];
}

function createRecordingHandlers(): RecordingHandlers {
  const received: string[] = [];
  const closes: number[] = [];
  return {
    received,
    closes,
    onMessage: (data) => received.push(data),
    onClose: (code) => closes.push(code),
    onError: () => undefined,
  };
}

function listen(server: WebSocketServer): Promise<number> {
  return new Promise((resolve) => {
    server.on('listening', () => {
      const address: AddressInfo | string | null = server.address();
      resolve(address === null || typeof address === 'string' ? 0 : address.port);
    });
  });
}

// ============ Tests ============

describe('WebSocketConnector', () => {
  let server: WebSocketServer;
  let url: string;
  let peers: WebSocket[];
  let inbound: string[];
  const connections: TransportConnection[] = [];

  beforeEach(async () => {
    peers = [];
    inbound = [];
    server = new WebSocketServer({ port: 0, host: '127.0.0.1' });
    server.on('connection', (socket) => {
      peers.push(socket);
      socket.on('message', (data) => inbound.push(data.toString()));
    });
    const port = await listen(server);
    url = `ws://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    for (const connection of connections.splice(0)) {
      connection.close();
    }
    for (const peer of peers) {
      peer.terminate();
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should open a connection and exchange text messages', async () => {
    const handlers = createRecordingHandlers();
    const connection = await new WebSocketConnector().connect(url, handlers, { timeoutMs: 1_000 });
    connections.push(connection);

    expect(connection.isOpen).toBe(true);

    await connection.send('{"guess":"openai"}');
    await vi.waitFor(() => expect(inbound).toEqual(['{"guess":"openai"}']));

    peers[0]?.send('{"command":"guess"}');
    await vi.waitFor(() => expect(handlers.received).toEqual(['{"command":"guess"}']));
  });

  it('should report a server close', async () => {
    const handlers = createRecordingHandlers();
    const connection = await new WebSocketConnector().connect(url, handlers, { timeoutMs: 1_000 });
    connections.push(connection);
    await vi.waitFor(() => expect(peers).toHaveLength(1));

    peers[0]?.close(4001, 'bye');

    await vi.waitFor(() => expect(handlers.closes).toEqual([4001]));
    expect(connection.isOpen).toBe(false);
  });

  it('should reject sends after close', async () => {
    const connection = await new WebSocketConnector().connect(url, createRecordingHandlers(), {
      timeoutMs: 1_000,
    });
    connection.close();

    await expect(connection.send('{}')).rejects.toBeInstanceOf(TransportFaultError);
  });

  it('should fail to connect when nothing is listening', async () => {
    const closedUrl = url;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    server = new WebSocketServer({ noServer: true });

    const attempt = new WebSocketConnector().connect(closedUrl, createRecordingHandlers(), {
      timeoutMs: 1_000,
    });

    await expect(attempt).rejects.toBeInstanceOf(TransportFaultError);
    await expect(attempt).rejects.toMatchObject({ kind: 'connect' });
  });

  it('should reject when aborted before connecting', async () => {
    const abort = new AbortController();
    abort.abort();

    await expect(
      new WebSocketConnector().connect(url, createRecordingHandlers(), {
        timeoutMs: 1_000,
        signal: abort.signal,
      })
    ).rejects.toThrow('Connect aborted');
  });
});
