/**
 * @fileoverview Error types raised by the agent runtime.
 *
 * Only transport-origin failures become exceptions that cross component
 * boundaries, and only `FatalConnectionError` reaches the caller of
 * `GameAgent.run()`.
 */

import type { ZodIssue } from 'zod';
import type { AgentPhase } from './types.js';

/**
 * Raised when a component requests a phase change the lifecycle table forbids.
 */
export class InvalidPhaseTransitionError extends Error {
  constructor(
    readonly from: AgentPhase,
    readonly to: AgentPhase
  ) {
    super(`Invalid phase transition: ${from} → ${to}`);
    this.name = 'InvalidPhaseTransitionError';
  }
}

export type TransportFaultKind = 'connect' | 'send' | 'receive_timeout' | 'closed';

/**
 * Recoverable transport failure, handled by the reconnection supervisor.
 */
export class TransportFaultError extends Error {
  constructor(
    readonly kind: TransportFaultKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportFaultError';
  }
}

/**
 * Reconnect attempts exhausted. Terminal for the agent.
 */
export class FatalConnectionError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: Error
  ) {
    super(`Connection failed after ${attempts} reconnect attempt(s): ${lastError.message}`, {
      cause: lastError,
    });
    this.name = 'FatalConnectionError';
  }
}

/**
 * Agent configuration failed validation.
 */
export class InvalidAgentConfigError extends Error {
  constructor(readonly issues: readonly ZodIssue[]) {
    super(
      `Invalid agent configuration: ${issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`
    );
    this.name = 'InvalidAgentConfigError';
  }
}
