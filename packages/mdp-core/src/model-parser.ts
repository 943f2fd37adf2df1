/**
 * Model file parser
 *
 * One state per non-blank line:
 *
 *   state_name reward (action1 dest1 prob1) (action2 dest2 prob2) ...
 *
 * Tokens are whitespace-separated, so each group arrives as three tokens:
 * `(action`, `dest`, `prob)`.
 */

import { readFile } from 'node:fs/promises';
import { MalformedActionTripleError, MalformedStateLineError } from '@bellman/mdp-contracts';
import { StateModel, parseNumberToken } from './state-model.js';

export interface ParsedModel {
  /** States in file order */
  states: Map<string, StateModel>;
  /** Non-fatal findings, e.g. a state defined twice */
  warnings: string[];
}

/**
 * Strip the group brackets from a state line's action tokens.
 */
export function unbracketActionTokens(tokens: readonly string[], line: number): string[] {
  if (tokens.length % 3 !== 0) {
    throw new MalformedActionTripleError(
      `Expected "(action destination probability)" groups, got ${tokens.length} trailing tokens`,
      line
    );
  }

  const stripped: string[] = [];
  for (let i = 0; i < tokens.length; i += 3) {
    const action = tokens[i] ?? '';
    const destination = tokens[i + 1] ?? '';
    const probability = tokens[i + 2] ?? '';

    if (!action.startsWith('(') || action.length < 2) {
      throw new MalformedActionTripleError(`Action token "${action}" must start with "("`, line);
    }
    if (!probability.endsWith(')') || probability.length < 2) {
      throw new MalformedActionTripleError(
        `Probability token "${probability}" must end with ")"`,
        line
      );
    }
    stripped.push(action.slice(1), destination, probability.slice(0, -1));
  }
  return stripped;
}

/**
 * Parse a whole model document.
 */
export function parseModel(text: string): ParsedModel {
  const states = new Map<string, StateModel>();
  const warnings: string[] = [];
  const lines = text.split(/\r?\n/);

  for (let index = 0; index < lines.length; index++) {
    const lineNumber = index + 1;
    const tokens = (lines[index] ?? '').trim().split(/\s+/).filter(Boolean);
    if (tokens.length === 0) {continue;}

    const [name, rewardToken, ...actionTokens] = tokens;
    if (name === undefined || rewardToken === undefined) {
      throw new MalformedStateLineError('Expected "state_name reward ..."', lineNumber);
    }
    const reward = parseNumberToken(rewardToken);
    if (reward === null) {
      throw new MalformedStateLineError(
        `Reward "${rewardToken}" of state "${name}" is not a number`,
        lineNumber
      );
    }

    let state: StateModel;
    try {
      state = StateModel.fromTriples(
        name,
        reward,
        unbracketActionTokens(actionTokens, lineNumber)
      );
    } catch (error) {
      // Re-throw triple errors raised without line context
      if (error instanceof MalformedActionTripleError && error.line === undefined) {
        throw new MalformedActionTripleError(error.message, lineNumber);
      }
      throw error;
    }

    if (states.has(name)) {
      warnings.push(`Line ${lineNumber}: state "${name}" redefined, earlier definition replaced`);
    }
    states.set(name, state);
  }

  return { states, warnings };
}

/**
 * Read and parse a model file (UTF-8).
 */
export async function loadModelFile(filePath: string): Promise<ParsedModel> {
  const content = await readFile(filePath, 'utf-8');
  return parseModel(content);
}
