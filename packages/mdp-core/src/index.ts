/**
 * @module @bellman/mdp-core
 * Finite-horizon value iteration over discrete MDPs.
 *
 * @example
 * ```typescript
 * import { PolicyEngine, parseModel, renderHistory } from '@bellman/mdp-core';
 *
 * const { states } = parseModel('S1 0 (a S1 1.0) (b S2 1.0)\nS2 10');
 * const engine = new PolicyEngine(0.9, states);
 * engine.extend(2);
 * console.log(renderHistory(engine));
 * // After iteration 1: (S1 None 0.0000) (S2 None 10.0000)
 * // After iteration 2: (S1 b 9.0000) (S2 None 10.0000)
 * ```
 */

export {
  StateModel,
  parseNumberToken,
  decodeTriples,
  groupTriples,
} from './state-model.js';

export { parseModel, loadModelFile, unbracketActionTokens } from './model-parser.js';
export type { ParsedModel } from './model-parser.js';

export {
  PolicyEngine,
  assertDiscount,
  expectedValue,
  selectBestAction,
} from './policy-engine.js';
export type { PolicyEngineOptions, ActionChoice } from './policy-engine.js';

export { renderSnapshot, renderHistory, formatValue } from './renderer.js';
export type { RenderOptions } from './renderer.js';

export { loadConfig, parseConfigText } from './config-loader.js';
export type { LoadConfigOptions, LoadedConfig } from './config-loader.js';

export { createConsoleLogger } from './logger.js';
export type { ConsoleLoggerOptions, LogSink } from './logger.js';

export { ProgressReporter } from './reporter.js';
