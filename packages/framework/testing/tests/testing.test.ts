/**
 * @fileoverview Tests for the testing utilities themselves.
 */

import type { TransportHandlers } from '@turnkit/agent';
import { describe, expect, it } from 'vitest';
import {
  clueAck,
  createMockConnection,
  createMockConnector,
  createRecordingStrategy,
  createScriptedGameServer,
  evaluateStrategy,
  gameStartedAck,
  guessCommand,
  parseCommand,
  resultMessage,
  TEST_IDS,
} from '../src/index.js';

// ============ Test Helpers ============

interface RecordingHandlers extends TransportHandlers {
  readonly received: string[];
  readonly closes: Array<{ code: number; reason: string }>;
}

function createRecordingHandlers(): RecordingHandlers {
  const received: string[] = [];
  const closes: Array<{ code: number; reason: string }> = [];
  return {
    received,
    closes,
    onMessage: (data) => received.push(data),
    onClose: (code, reason) => closes.push({ code, reason }),
    onError: () => undefined,
  };
}

const CONNECT_OPTIONS = { timeoutMs: 1_000 };

// ============ Tests ============

describe('createMockConnection', () => {
  it('should start open', () => {
    const conn = createMockConnection(createRecordingHandlers());
    expect(conn.isOpen).toBe(true);
    expect(conn.isClosed).toBe(false);
  });

  it('should store sent messages', async () => {
    const conn = createMockConnection(createRecordingHandlers());
    await conn.send('{"guess":"a"}');
    await conn.send('{"guess":"b"}');

    expect(conn.sentMessages).toEqual(['{"guess":"a"}', '{"guess":"b"}']);
  });

  it('should parse messages as JSON', async () => {
    const conn = createMockConnection(createRecordingHandlers());
    await conn.send('{"guess":"openai","otp":"test-otp"}');

    expect(conn.getSentMessagesAsJson()).toEqual([{ guess: 'openai', otp: 'test-otp' }]);
    expect(conn.getLastMessageAsJson()).toEqual({ guess: 'openai', otp: 'test-otp' });
  });

  it('should return undefined for last message when empty', () => {
    const conn = createMockConnection(createRecordingHandlers());
    expect(conn.getLastMessageAsJson()).toBeUndefined();
  });

  it('should reject sends after close and record the close code', async () => {
    const conn = createMockConnection(createRecordingHandlers());
    conn.close(4000);

    await expect(conn.send('{}')).rejects.toThrow('Connection is not open');
    expect(conn.isClosed).toBe(true);
    expect(conn.closeCode).toBe(4000);
    expect(conn.sentMessages).toHaveLength(0);
  });

  it('should reject sends once failSends is called', async () => {
    const conn = createMockConnection(createRecordingHandlers());
    conn.failSends();

    await expect(conn.send('{}')).rejects.toThrow('Simulated send failure');
  });

  it('should deliver simulated messages, encoding objects as JSON', () => {
    const handlers = createRecordingHandlers();
    const conn = createMockConnection(handlers);

    conn.simulateMessage('raw text');
    conn.simulateMessage({ command: 'guess' });

    expect(handlers.received).toEqual(['raw text', '{"command":"guess"}']);
  });

  it('should report a simulated close once', () => {
    const handlers = createRecordingHandlers();
    const conn = createMockConnection(handlers);

    conn.simulateClose(1006, 'gone');
    conn.simulateClose(1000);
    conn.simulateMessage('ignored');

    expect(handlers.closes).toEqual([{ code: 1006, reason: 'gone' }]);
    expect(handlers.received).toEqual([]);
    expect(conn.isOpen).toBe(false);
  });

  it('should notify send listeners after recording the message', async () => {
    const conn = createMockConnection(createRecordingHandlers());
    const seen: Array<[string, number]> = [];
    conn.onSend((data) => seen.push([data, conn.sentMessages.length]));

    await conn.send('{"guess":"a"}');

    expect(seen).toEqual([['{"guess":"a"}', 1]]);
  });

  it('should clear messages', async () => {
    const conn = createMockConnection(createRecordingHandlers());
    await conn.send('{}');
    conn.clearSentMessages();

    expect(conn.sentMessages).toHaveLength(0);
  });
});

describe('createMockConnector', () => {
  it('should hand out a new connection per connect call', async () => {
    const connector = createMockConnector();

    await connector.connect('ws://game.test/a', createRecordingHandlers(), CONNECT_OPTIONS);
    await connector.connect('ws://game.test/b', createRecordingHandlers(), CONNECT_OPTIONS);

    expect(connector.connections).toHaveLength(2);
    expect(connector.connectAttempts).toBe(2);
    expect(connector.urls).toEqual(['ws://game.test/a', 'ws://game.test/b']);
    expect(connector.latest()).toBe(connector.connections[1]);
  });

  it('should fail the requested number of connects', async () => {
    const connector = createMockConnector();
    connector.failNextConnects(2, 'refused');

    await expect(
      connector.connect('ws://game.test', createRecordingHandlers(), CONNECT_OPTIONS)
    ).rejects.toThrow('refused');
    await expect(
      connector.connect('ws://game.test', createRecordingHandlers(), CONNECT_OPTIONS)
    ).rejects.toThrow('refused');
    await expect(
      connector.connect('ws://game.test', createRecordingHandlers(), CONNECT_OPTIONS)
    ).resolves.toBeDefined();

    expect(connector.connectAttempts).toBe(3);
    expect(connector.connections).toHaveLength(1);
  });

  it('should run onOpen before connect resolves', async () => {
    const handlers = createRecordingHandlers();
    const connector = createMockConnector((connection) => {
      connection.simulateMessage(gameStartedAck());
    });

    await connector.connect('ws://game.test', handlers, CONNECT_OPTIONS);

    expect(handlers.received).toEqual([gameStartedAck()]);
  });

  it('should resolve waitForConnection once the connection exists', async () => {
    const connector = createMockConnector();
    const waiting = connector.waitForConnection(0);

    await connector.connect('ws://game.test', createRecordingHandlers(), CONNECT_OPTIONS);

    await expect(waiting).resolves.toBe(connector.connections[0]);
  });
});

describe('message factories', () => {
  it('should build a game started acknowledgment', () => {
    expect(JSON.parse(gameStartedAck())).toEqual({
      type: 'ack',
      ackFor: 'game started',
      matchId: 'match-1',
      gameId: 'game-1',
      yourId: 'player-1',
    });
  });

  it('should drop fields overridden with undefined', () => {
    expect(JSON.parse(clueAck('hint', { matchId: undefined }))).toEqual({
      type: 'ack',
      ackFor: 'meta data',
      ackData: 'hint',
      gameId: 'game-1',
    });
  });

  it('should build a result with the given outcome', () => {
    expect(JSON.parse(resultMessage('loss', { word: 'anthropic' }))).toEqual({
      type: 'result',
      result: 'loss',
      matchId: 'match-1',
      gameId: 'game-1',
      word: 'anthropic',
    });
  });

  it('should classify a guess command with the test otp', () => {
    const command = parseCommand(guessCommand());

    expect(command.command).toBe('guess');
    expect(command.gameData).toEqual({ otp: TEST_IDS.otp });
  });

  it('should reject a payload of the wrong kind', () => {
    expect(() => parseCommand(resultMessage())).toThrow('Expected a command, got result');
  });
});

describe('createScriptedGameServer', () => {
  const ids = { matchId: 'scripted-match-3', gameId: 'scripted-game-3' };

  it('should send commands until the answer is named', async () => {
    const server = createScriptedGameServer({ answer: 'crane', clues: ['a wading bird'] }, 3);
    const handlers = createRecordingHandlers();
    const connection = await server.connector.connect('ws://scripted.test', handlers, CONNECT_OPTIONS);

    expect(handlers.received.map((raw): unknown => JSON.parse(raw))).toEqual([
      { type: 'ack', ackFor: 'game started', ...ids, yourId: 'scripted-player-3' },
      { type: 'ack', ackFor: 'meta data', ...ids, ackData: 'a wading bird' },
      { command: 'guess', ...ids, otp: 'scripted-otp-3', currentAttempt: 1, maxAttempts: 6 },
    ]);

    await connection.send('{"guess":"heron"}');
    await connection.send('{"guess":"CRANE"}');

    expect(handlers.received.slice(3).map((raw): unknown => JSON.parse(raw))).toEqual([
      {
        command: 'guess',
        ...ids,
        otp: 'scripted-otp-3',
        currentAttempt: 2,
        maxAttempts: 6,
        lastGuess: 'heron',
      },
      { type: 'game result', ...ids, result: 'win', word: 'crane' },
    ]);
    expect(server.finished).toBe(true);
    expect(server.report()).toEqual({
      answer: 'crane',
      won: true,
      attempts: 2,
      guesses: ['heron', 'CRANE'],
      completed: true,
    });
  });

  it('should end in a loss when attempts run out and ignore later moves', async () => {
    const server = createScriptedGameServer({ answer: 'crane', maxAttempts: 1 }, 3);
    const handlers = createRecordingHandlers();
    const connection = await server.connector.connect('ws://scripted.test', handlers, CONNECT_OPTIONS);

    await connection.send('{"guess":"heron"}');
    await connection.send('{"guess":"crane"}');

    expect(handlers.received).toHaveLength(3);
    expect(JSON.parse(handlers.received[2] ?? 'null')).toEqual({
      type: 'game result',
      ...ids,
      result: 'loss',
      word: 'crane',
    });
    expect(server.report()).toMatchObject({ won: false, attempts: 1, guesses: ['heron'] });
  });
});

describe('evaluateStrategy', () => {
  it('should play every game with a fresh agent and summarize the results', async () => {
    const report = await evaluateStrategy(
      () => createRecordingStrategy({ makeMove: (_message, context) => context.clues[0] ?? null }),
      [
        { answer: 'anthropic', clues: ['anthropic'] },
        { answer: 'openai', clues: ['google'], maxAttempts: 2 },
      ]
    );

    expect(report).toEqual({
      games: [
        { answer: 'anthropic', won: true, attempts: 1, guesses: ['anthropic'], completed: true },
        { answer: 'openai', won: false, attempts: 2, guesses: ['google', 'google'], completed: true },
      ],
      gamesPlayed: 2,
      gamesWon: 1,
      gamesLost: 1,
      gamesFailed: 0,
      winRate: 50,
      averageAttempts: 1.5,
    });
  });

  it('should report a game the agent never answers as failed', async () => {
    const report = await evaluateStrategy(
      () => createRecordingStrategy({ makeMove: () => null }),
      [{ answer: 'anthropic' }],
      { receiveTimeoutMs: 30 }
    );

    expect(report).toMatchObject({ gamesPlayed: 0, gamesFailed: 1, winRate: 0, averageAttempts: 0 });
    expect(report.games[0]).toMatchObject({ completed: false, attempts: 0 });
    expect(report.games[0]?.error).toMatch(/^Connection failed after 0 reconnect attempt\(s\)/);
  });
});
