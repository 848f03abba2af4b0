/**
 * @fileoverview Transport abstraction between the agent and a bidirectional
 * text-message connection.
 */

import type { OutboundChannel } from '../MoveDispatcher.js';

/**
 * Callbacks for one connection. Passed at connect time so nothing the
 * server sends right after the handshake is missed.
 */
export interface TransportHandlers {
  onMessage(data: string): void;
  /** The peer or the network closed the connection */
  onClose(code: number, reason: string): void;
  /** Error on an open connection; a close follows */
  onError(error: Error): void;
}

export interface TransportConnection extends OutboundChannel {
  readonly isOpen: boolean;
  send(data: string): Promise<void>;
  close(code?: number, reason?: string): void;
}

export interface ConnectOptions {
  timeoutMs: number;
  signal?: AbortSignal | undefined;
}

/**
 * Opens connections. Rejects with a `TransportFaultError` of kind
 * `connect` when the handshake fails or times out.
 */
export interface TransportConnector {
  connect(
    url: string,
    handlers: TransportHandlers,
    options: ConnectOptions
  ): Promise<TransportConnection>;
}

/** Close code for a normal shutdown */
export const NORMAL_CLOSURE = 1000;
