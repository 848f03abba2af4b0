/**
 * @fileoverview Agent connection configuration.
 * Validated with Zod, defaulted, then frozen; immutable after construction.
 */

import { z } from 'zod';
import { InvalidAgentConfigError } from './errors.js';

export const AgentConfigSchema = z.object({
  /** Game server address (ws:// or wss://) */
  url: z
    .string()
    .url()
    .refine((value) => /^wss?:\/\//i.test(value), { message: 'must be a ws:// or wss:// URL' }),
  connectTimeoutMs: z.number().int().positive().default(10_000),
  /** Idle time allowed between inbound messages */
  receiveTimeoutMs: z.number().int().positive().default(2_000),
  /** Keep the connection open across successive games */
  keepAlive: z.boolean().default(true),
  maxReconnectAttempts: z.number().int().min(0).default(3),
  reconnectDelayMs: z.number().int().min(0).default(5_000),
  /** Delay growth per attempt; 1 keeps the delay fixed */
  backoffMultiplier: z.number().min(1).default(1),
  maxReconnectDelayMs: z.number().int().min(0).default(60_000),
});

export type AgentConfigInput = z.input<typeof AgentConfigSchema>;
export type AgentConfig = Readonly<z.output<typeof AgentConfigSchema>>;

/**
 * Validate and default a configuration.
 * @throws {InvalidAgentConfigError} if any option is invalid
 */
export function resolveAgentConfig(input: AgentConfigInput): AgentConfig {
  const result = AgentConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidAgentConfigError(result.error.issues);
  }
  return Object.freeze(result.data);
}

/**
 * Delay before reconnect attempt `attempt` (1-based).
 */
export function reconnectDelayFor(config: AgentConfig, attempt: number): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = config.reconnectDelayMs * config.backoffMultiplier ** exponent;
  return Math.min(delay, config.maxReconnectDelayMs);
}
