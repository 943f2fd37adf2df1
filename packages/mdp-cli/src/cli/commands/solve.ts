/**
 * solve - run value iteration over a model file and print the policy history
 *
 * Usage:
 *   bellman model.in 0.9
 *   bellman model.in 0.9 --iterations=50
 *   bellman model.in 0.9 --json
 *   bellman model.in 0.9 --config=conf/bellman.yml --verbose
 */

import { parseArgs } from 'node:util';
import { resolve } from 'node:path';
import type { ILogger, PolicySnapshot } from '@bellman/mdp-contracts';
import {
  InvalidDiscountError,
  InvalidIterationCountError,
  isBellmanError,
} from '@bellman/mdp-contracts';
import {
  PolicyEngine,
  ProgressReporter,
  createConsoleLogger,
  loadConfig,
  loadModelFile,
  parseNumberToken,
  renderHistory,
} from '@bellman/mdp-core';
import type { CommandContext, CommandResult } from '../context.js';

/**
 * Command flags for solve
 */
export const solveFlags = {
  iterations: {
    type: 'string',
    description: 'Number of iterations to compute (default from config, else 20)',
  },
  json: {
    type: 'boolean',
    description: 'Print the history as JSON',
    default: false,
  },
  config: {
    type: 'string',
    description: 'Config file path (default: ./bellman.config.yml if present)',
  },
  verbose: {
    type: 'boolean',
    description: 'Log progress to stderr',
    default: false,
  },
} as const;

export const SOLVE_USAGE =
  'Usage: bellman <input-file> <discount> [--iterations N] [--json] [--config PATH] [--verbose]';

export interface SolveFlags {
  iterations?: string;
  json: boolean;
  config?: string;
  verbose: boolean;
}

export interface SolveInput {
  inputFile: string;
  discountText: string;
  flags: SolveFlags;
}

export interface PolicyLine {
  state: string;
  action: string | null;
  value: number;
}

export interface SolveResponse {
  success: true;
  discount: number;
  iterations: number;
  snapshots: Array<{ iteration: number; policy: PolicyLine[] }>;
}

export interface SolveErrorResponse {
  success: false;
  error: string;
  code: string;
}

export type SolveResult = CommandResult<SolveResponse | SolveErrorResponse>;

function tryParseArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: solveFlags,
      allowPositionals: true,
      strict: true,
    });
  } catch {
    // Unknown flag or missing flag value: reported as a usage error
    return null;
  }
}

/**
 * Split argv into positionals and flags. Returns null on a usage error.
 */
export function parseSolveArgs(argv: readonly string[]): SolveInput | null {
  const parsed = tryParseArgs(argv);
  if (!parsed) {
    return null;
  }

  const [inputFile, discountText, ...rest] = parsed.positionals;
  if (inputFile === undefined || discountText === undefined || rest.length > 0) {
    return null;
  }

  const { iterations, json, config, verbose } = parsed.values;
  return {
    inputFile,
    discountText,
    flags: {
      iterations: typeof iterations === 'string' ? iterations : undefined,
      json: json === true,
      config: typeof config === 'string' ? config : undefined,
      verbose: verbose === true,
    },
  };
}

export function parseDiscount(text: string): number {
  const discount = parseNumberToken(text);
  if (discount === null || discount < 0 || discount > 1) {
    throw new InvalidDiscountError(text);
  }
  return discount;
}

export function parseIterations(text: string): number {
  const iterations = parseNumberToken(text);
  if (iterations === null || !Number.isInteger(iterations) || iterations < 1) {
    throw new InvalidIterationCountError(text);
  }
  return iterations;
}

function toPolicyLines(snapshot: PolicySnapshot): PolicyLine[] {
  return [...snapshot].map(([state, entry]) => ({
    state,
    action: entry.action,
    value: entry.value,
  }));
}

export async function runSolve(ctx: CommandContext, argv: readonly string[]): Promise<SolveResult> {
  const input = parseSolveArgs(argv);
  if (!input) {
    ctx.ui.error(`${SOLVE_USAGE}\n`);
    return { exitCode: 1 };
  }

  const { flags } = input;
  let logger: ILogger | undefined = ctx.logger;

  try {
    const discount = parseDiscount(input.discountText);
    const { config, source } = await loadConfig({ cwd: ctx.cwd, configPath: flags.config });
    const iterations =
      flags.iterations === undefined ? config.iterations : parseIterations(flags.iterations);

    logger ??= createConsoleLogger({ level: flags.verbose ? 'debug' : config.logLevel });
    if (source) {
      logger.debug('Loaded config', { source });
    }

    const reporter = new ProgressReporter(logger);
    const modelPath = resolve(ctx.cwd, input.inputFile);
    const model = await loadModelFile(modelPath);
    for (const warning of model.warnings) {
      logger.warn(warning);
    }

    let actionCount = 0;
    for (const state of model.states.values()) {
      actionCount += state.actionCount;
    }
    reporter.modelLoaded(input.inputFile, model.states.size, actionCount);

    const engine = new PolicyEngine(discount, model.states, {
      logger,
      onIteration: (event) => reporter.iteration(event),
    });
    reporter.extensionStarted(engine.length, iterations);
    engine.extend(iterations);
    reporter.extensionCompleted(engine.length);

    const response: SolveResponse = {
      success: true,
      discount,
      iterations: engine.length,
      snapshots: engine.history().map((snapshot, i) => ({
        iteration: i + 1,
        policy: toPolicyLines(snapshot),
      })),
    };

    if (flags.json) {
      ctx.ui.write(JSON.stringify(response, null, 2) + '\n');
    } else {
      ctx.ui.write(renderHistory(engine, iterations, { precision: config.precision }) + '\n');
    }

    return { exitCode: 0, response };
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    const errResponse: SolveErrorResponse = {
      success: false,
      error: error.message,
      code: isBellmanError(error) ? error.code : 'UNEXPECTED',
    };
    logger?.error('solve failed', error, { code: errResponse.code });

    if (flags.json) {
      ctx.ui.write(JSON.stringify(errResponse, null, 2) + '\n');
    } else {
      ctx.ui.error(`Error: ${error.message}\n`);
    }
    return { exitCode: 1, response: errResponse };
  }
}
