/**
 * @fileoverview WebSocket transport built on `ws`.
 */

import WebSocket, { type ClientOptions, type RawData } from 'ws';
import { TransportFaultError } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import {
  NORMAL_CLOSURE,
  type ConnectOptions,
  type TransportConnection,
  type TransportConnector,
  type TransportHandlers,
} from './Transport.js';

function decode(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

class WebSocketConnection implements TransportConnection {
  constructor(private readonly socket: WebSocket) {}

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.isOpen) {
        reject(new TransportFaultError('send', 'Connection is not open'));
        return;
      }
      this.socket.send(data, (error) => {
        if (error) {
          reject(new TransportFaultError('send', `Send failed: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  close(code: number = NORMAL_CLOSURE, reason = ''): void {
    const state = this.socket.readyState;
    if (state === WebSocket.OPEN || state === WebSocket.CONNECTING) {
      this.socket.close(code, reason);
    }
  }
}

/**
 * Connector for ws:// and wss:// game servers.
 */
export class WebSocketConnector implements TransportConnector {
  private readonly log: Logger;

  constructor(
    private readonly clientOptions: ClientOptions = {},
    logger?: Logger
  ) {
    this.log = logger ?? createLogger('transport');
  }

  connect(
    url: string,
    handlers: TransportHandlers,
    options: ConnectOptions
  ): Promise<TransportConnection> {
    const { timeoutMs, signal } = options;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new TransportFaultError('connect', 'Connect aborted'));
        return;
      }

      this.log.info('Connecting', { url });
      const socket = new WebSocket(url, { ...this.clientOptions, handshakeTimeout: timeoutMs });
      let opened = false;

      const fail = (error: TransportFaultError): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        socket.terminate();
        reject(error);
      };

      const onAbort = (): void => fail(new TransportFaultError('connect', 'Connect aborted'));
      signal?.addEventListener('abort', onAbort, { once: true });

      const timer = setTimeout(() => {
        fail(new TransportFaultError('connect', `Connect timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      socket.on('open', () => {
        opened = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.log.info('Connected', { url });
        resolve(new WebSocketConnection(socket));
      });

      socket.on('message', (data: RawData) => {
        handlers.onMessage(decode(data));
      });

      socket.on('error', (error: Error) => {
        if (!opened) {
          fail(
            new TransportFaultError('connect', `Failed to connect to ${url}: ${error.message}`, {
              cause: error,
            })
          );
          return;
        }
        this.log.warn('WebSocket error', { error: error.message });
        handlers.onError(error);
      });

      socket.on('close', (code: number, reason: Buffer) => {
        if (!opened) {
          fail(new TransportFaultError('connect', `Connection closed during handshake (${code})`));
          return;
        }
        this.log.info('Disconnected', { code, reason: reason.toString() });
        handlers.onClose(code, reason.toString());
      });
    });
  }
}
