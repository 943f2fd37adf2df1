// ============================================
// Bellman - Type Contracts
// ============================================

// MDP Types
export type {
  OutcomeTable,
  ActionTable,
  ActionTriple,
  MdpState,
  PolicyEntry,
  PolicySnapshot,
  IterationComputedEvent,
} from './types.js';

// Logging
export type { ILogger, LogLevel, LogMeta } from './logger.js';

// Progress Events
export type {
  ProgressEventType,
  BaseProgressEvent,
  ModelLoadedEvent,
  ExtensionStartedEvent,
  IterationComputedProgressEvent,
  ExtensionCompletedEvent,
  ProgressEvent,
  ProgressCallback,
} from './progress.js';

// Errors
export {
  BellmanError,
  InvalidDiscountError,
  MalformedActionTripleError,
  MalformedStateLineError,
  UnknownDestinationStateError,
  InvalidIterationCountError,
  ConfigError,
  isBellmanError,
} from './errors.js';
export type { BellmanErrorCode } from './errors.js';

// Configuration
export {
  LogLevelSchema,
  BellmanConfigSchema,
  parseBellmanConfig,
  validateBellmanConfig,
} from './config-schema.js';
export type { BellmanConfig } from './config-schema.js';

// Constants
export {
  DEFAULT_ITERATIONS,
  DEFAULT_PRECISION,
  NO_ACTION_LABEL,
  DEFAULT_CONFIG_FILE,
} from './constants.js';
