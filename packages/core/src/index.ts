// @crowdsim/core: main entry point

export { RunManager } from './RunManager.js';
export type { RunManagerOptions, RunEventMap, RunEventName, RunEventHandler, RunFailure } from './RunManager.js';
export { AgentModel, createAgent, initialState, sentimentScore } from './AgentModel.js';
export type { AgentModelOptions, Evaluation } from './AgentModel.js';
export { MarketModel } from './MarketModel.js';
export type { MarketModelOptions, StepClock } from './MarketModel.js';
export {
  SyntheticPersonaProvider,
  ExternalPersonaProvider,
  FallbackPersonaProvider,
  stripFreeText,
  isRestrictedField,
  keyTokens,
} from './PersonaProvider.js';
export type { ExternalPersonaProviderOptions } from './PersonaProvider.js';
export { TemplateContentProducer, moodOf } from './ContentProducer.js';
export type { Mood } from './ContentProducer.js';
export { RunLog } from './RunLog.js';
export { summarizeResults, summarize, chartData, keywordTotals, peakActivity, tokenize } from './ResultsAggregator.js';
export { serializeRunArtifact, parseRunArtifact, FileResultSink, RunArtifactSchema } from './ResultArtifact.js';
export {
  validateSimulationConfig,
  validatePersonaTraits,
  assertSimulationConfig,
  assertPersonaTraits,
  assertMarketParams,
  isRecord,
  toIssues,
  SimulationConfigSchema,
  PersonaTraitsSchema,
  MarketParamsSchema,
} from './ConfigValidator.js';
export type { ValidationResult, SimulationConfigInput } from './ConfigValidator.js';
export {
  CrowdSimError,
  ConfigValidationError,
  ConflictError,
  PersonaSourceError,
  MarketSeedError,
  StepExecutionError,
  describeError,
} from './errors.js';
export type { ValidationIssue } from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
export { Rng, deriveSeed, STREAM } from './Rng.js';
export { DatasetPersonaSource, profileToTraits, DEFAULT_DATASET } from './sources/DatasetPersonaSource.js';
export type { DatasetPersonaSourceOptions } from './sources/DatasetPersonaSource.js';
export { KalshiTrendSource, KALSHI_PUBLIC_API, cleanTitle, matchTopic, rankMarkets } from './sources/KalshiTrendSource.js';
export type { KalshiTrendSourceOptions, KalshiMarket, KalshiMarketsClient } from './sources/KalshiTrendSource.js';
export {
  STEPS_PER_DAY,
  STEP_MINUTES,
  DEFAULT_START_TIME,
  DEFAULT_MARKET_TOPIC,
  DEFAULT_MARKET_PARAMS,
  CONFIG_BOUNDS,
  RECENT_LOG_LIMIT,
  GROUP_CONFORMITY,
  GROUP_LEAN,
} from './defaults.js';
export type { MarketParams } from './defaults.js';
export * from './stages/index.js';
export type * from './types.js';
