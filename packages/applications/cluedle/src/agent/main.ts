/**
 * @fileoverview Cluedle agent launcher.
 *
 * Usage: `tsx src/agent/main.ts [ws-url]`
 */

import { createLogger, FatalConnectionError, GameAgent, summarizeStats } from '@turnkit/agent';
import { loadCluedleConfig } from '../config/agentConfig.js';
import { KeywordCluedleStrategy } from '../strategy/KeywordCluedleStrategy.js';

const log = createLogger('cluedle');

const args = process.argv.slice(2);
const config = loadCluedleConfig();
const serverUrl = args[0] ?? config.agent.url;

log.info('Starting Cluedle agent', { serverUrl, keepAlive: config.agent.keepAlive });

const agent: GameAgent<string> = new GameAgent({
  config: { ...config.agent, url: serverUrl },
  strategy: new KeywordCluedleStrategy(config.strategy),
  observers: [
    {
      onGameEnded: () => {
        log.info('Statistics', { ...summarizeStats(agent.stats) });
      },
    },
  ],
});

// Graceful shutdown
process.on('SIGTERM', () => {
  log.info('SIGTERM received, closing agent...');
  agent.close();
});

process.on('SIGINT', () => {
  log.info('SIGINT received, closing agent...');
  agent.close();
});

try {
  await agent.run();
} catch (error) {
  if (error instanceof FatalConnectionError) {
    log.error('Giving up on the game server', {
      attempts: error.attempts,
      lastError: error.lastError.message,
    });
  } else {
    log.error('Agent stopped unexpectedly', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  process.exitCode = 1;
} finally {
  log.info('Final statistics', { ...summarizeStats(agent.stats) });
}
