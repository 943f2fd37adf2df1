/**
 * StateModel - immutable reward and action table of one MDP state
 */

import type { ActionTable, ActionTriple, MdpState, OutcomeTable } from '@bellman/mdp-contracts';
import { MalformedActionTripleError } from '@bellman/mdp-contracts';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^[+-]?(inf|infinity)$/i;

/**
 * Parse a numeric token (probability, reward, discount).
 *
 * Accepts decimal and exponent notation plus `inf`/`infinity`;
 * anything else (including trailing garbage such as `0.5x`) is rejected.
 */
export function parseNumberToken(token: string): number | null {
  const text = token.trim();
  if (DECIMAL_PATTERN.test(text)) {
    return Number(text);
  }
  if (INFINITY_PATTERN.test(text)) {
    return text.startsWith('-') ? -Infinity : Infinity;
  }
  return null;
}

/**
 * Decode a flat `[action, destination, probability, ...]` token list
 * into ordered triples.
 */
export function decodeTriples(tokens: readonly string[]): ActionTriple[] {
  if (tokens.length % 3 !== 0) {
    throw new MalformedActionTripleError(
      `Expected action tokens in groups of 3, got ${tokens.length}`
    );
  }

  const triples: ActionTriple[] = [];
  for (let i = 0; i < tokens.length; i += 3) {
    const action = tokens[i] ?? '';
    const destination = tokens[i + 1] ?? '';
    const rawProbability = tokens[i + 2] ?? '';
    const probability = parseNumberToken(rawProbability);

    if (probability === null) {
      throw new MalformedActionTripleError(
        `Probability "${rawProbability}" of action "${action}" is not a number`
      );
    }
    triples.push({ action, destination, probability });
  }
  return triples;
}

/**
 * Group triples by action. A repeated (action, destination) pair keeps
 * the position of its first occurrence and the probability of its last.
 */
export function groupTriples(triples: readonly ActionTriple[]): ActionTable {
  const actions = new Map<string, Map<string, number>>();

  for (const { action, destination, probability } of triples) {
    let outcomes = actions.get(action);
    if (!outcomes) {
      outcomes = new Map();
      actions.set(action, outcomes);
    }
    outcomes.set(destination, probability);
  }

  return actions;
}

export class StateModel implements MdpState {
  readonly actions: ActionTable;

  constructor(
    readonly name: string,
    readonly reward: number,
    actions: ActionTable = new Map()
  ) {
    // Copy so later changes to the caller's maps cannot leak in
    const copy = new Map<string, OutcomeTable>();
    for (const [action, outcomes] of actions) {
      copy.set(action, new Map(outcomes));
    }
    this.actions = copy;
    Object.freeze(this);
  }

  /**
   * Build a state from already-unbracketed action tokens.
   */
  static fromTriples(name: string, reward: number, tokens: readonly string[]): StateModel {
    return new StateModel(name, reward, groupTriples(decodeTriples(tokens)));
  }

  get actionCount(): number {
    return this.actions.size;
  }

  /**
   * Destinations referenced by any action, in first-seen order
   */
  destinations(): string[] {
    const seen = new Set<string>();
    for (const outcomes of this.actions.values()) {
      for (const destination of outcomes.keys()) {
        seen.add(destination);
      }
    }
    return [...seen];
  }
}
