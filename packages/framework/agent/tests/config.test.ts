import { describe, expect, it } from 'vitest';
import { reconnectDelayFor, resolveAgentConfig } from '../src/config.js';
import { InvalidAgentConfigError } from '../src/errors.js';

describe('resolveAgentConfig', () => {
  it('should apply defaults', () => {
    expect(resolveAgentConfig({ url: 'ws://localhost:8080/ws' })).toEqual({
      url: 'ws://localhost:8080/ws',
      connectTimeoutMs: 10_000,
      receiveTimeoutMs: 2_000,
      keepAlive: true,
      maxReconnectAttempts: 3,
      reconnectDelayMs: 5_000,
      backoffMultiplier: 1,
      maxReconnectDelayMs: 60_000,
    });
  });

  it('should freeze the result', () => {
    expect(Object.isFrozen(resolveAgentConfig({ url: 'wss://game.test' }))).toBe(true);
  });

  it('should reject non-WebSocket URLs', () => {
    expect(() => resolveAgentConfig({ url: 'http://localhost:8080' })).toThrow(
      InvalidAgentConfigError
    );
  });

  it('should name every invalid field', () => {
    try {
      resolveAgentConfig({ url: 'ws://game.test', receiveTimeoutMs: 0, maxReconnectAttempts: -1 });
      expect.unreachable('resolveAgentConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidAgentConfigError);
      if (error instanceof InvalidAgentConfigError) {
        expect(error.issues.map((issue) => issue.path.join('.'))).toEqual([
          'receiveTimeoutMs',
          'maxReconnectAttempts',
        ]);
      }
    }
  });
});

describe('reconnectDelayFor', () => {
  it('should keep a fixed delay by default', () => {
    const config = resolveAgentConfig({ url: 'ws://game.test', reconnectDelayMs: 5_000 });

    expect([1, 2, 3].map((attempt) => reconnectDelayFor(config, attempt))).toEqual([
      5_000, 5_000, 5_000,
    ]);
  });

  it('should grow by the multiplier and stop at the cap', () => {
    const config = resolveAgentConfig({
      url: 'ws://game.test',
      reconnectDelayMs: 1_000,
      backoffMultiplier: 2,
      maxReconnectDelayMs: 5_000,
    });

    expect([1, 2, 3, 4].map((attempt) => reconnectDelayFor(config, attempt))).toEqual([
      1_000, 2_000, 4_000, 5_000,
    ]);
  });
});
