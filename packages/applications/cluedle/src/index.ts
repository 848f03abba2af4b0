/**
 * @fileoverview Cluedle example agent.
 *
 * Cluedle servers send riddle clues as `meta data` acknowledgments and then
 * ask for a guess; the keyword strategy answers from the clues seen so far.
 */

export {
  clearConfigCache,
  loadCluedleConfig,
  readEnvOverrides,
  type CluedleConfig,
} from './config/agentConfig.js';
export {
  DEFAULT_RULES,
  KeywordCluedleStrategy,
  KeywordRuleSchema,
  KeywordStrategyConfigSchema,
  solveClues,
  type KeywordRule,
  type KeywordStrategyConfig,
  type KeywordStrategyConfigInput,
} from './strategy/KeywordCluedleStrategy.js';
