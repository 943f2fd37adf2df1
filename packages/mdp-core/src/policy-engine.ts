/**
 * PolicyEngine - finite-horizon value iteration with a memoized history
 *
 * Snapshot 0 holds every state's reward. Snapshot i (i > 0) is the Bellman
 * backup of snapshot i-1:
 *
 *   value(s) = reward(s) + discount * max_a Σ P(a, s') * value_{i-1}(s')
 *
 * The history is append-only. `extend` computes only the missing suffix and
 * commits it in one step, so a failed call leaves the history as it was.
 */

import type {
  ILogger,
  IterationComputedEvent,
  MdpState,
  OutcomeTable,
  PolicyEntry,
  PolicySnapshot,
} from '@bellman/mdp-contracts';
import {
  InvalidDiscountError,
  InvalidIterationCountError,
  UnknownDestinationStateError,
} from '@bellman/mdp-contracts';

export interface PolicyEngineOptions {
  logger?: ILogger;
  /** Called for each snapshot committed by `extend`, in iteration order */
  onIteration?: (event: IterationComputedEvent) => void;
}

/**
 * Best action of a state against a previous snapshot.
 */
export interface ActionChoice {
  action: string | null;
  expected: number;
}

export function assertDiscount(discount: number): void {
  if (typeof discount !== 'number' || Number.isNaN(discount) || discount < 0 || discount > 1) {
    throw new InvalidDiscountError(discount);
  }
}

/**
 * Σ p * previous[destination].value over one action's outcomes (0 if none).
 */
export function expectedValue(
  state: MdpState,
  action: string,
  outcomes: OutcomeTable,
  previous: PolicySnapshot
): number {
  let total = 0;
  for (const [destination, probability] of outcomes) {
    const entry = previous.get(destination);
    if (!entry) {
      throw new UnknownDestinationStateError(state.name, action, destination);
    }
    total += probability * entry.value;
  }
  return total;
}

/**
 * Pick the action with the strictly greatest expected value.
 *
 * Actions are visited in the state's stored order and an equal value never
 * replaces the current best, so the first of several tied actions wins.
 */
export function selectBestAction(state: MdpState, previous: PolicySnapshot): ActionChoice {
  if (state.actions.size === 0) {
    return { action: null, expected: 0 };
  }

  let best: ActionChoice = { action: null, expected: -Infinity };
  for (const [action, outcomes] of state.actions) {
    const expected = expectedValue(state, action, outcomes, previous);
    if (best.expected < expected) {
      best = { action, expected };
    }
  }
  return best;
}

export class PolicyEngine {
  private readonly states: ReadonlyMap<string, MdpState>;
  private readonly snapshots: PolicySnapshot[] = [];
  private readonly logger?: ILogger;
  private readonly onIteration?: (event: IterationComputedEvent) => void;

  constructor(
    readonly discount: number,
    states: ReadonlyMap<string, MdpState>,
    options: PolicyEngineOptions = {}
  ) {
    assertDiscount(discount);

    this.states = new Map(states);
    this.logger = options.logger;
    this.onIteration = options.onIteration;

    const initial = new Map<string, PolicyEntry>();
    for (const [name, state] of this.states) {
      initial.set(name, Object.freeze({ action: null, value: state.reward }));
    }
    this.snapshots.push(initial);
  }

  /**
   * Number of cached snapshots (always at least 1)
   */
  get length(): number {
    return this.snapshots.length;
  }

  stateNames(): string[] {
    return [...this.states.keys()];
  }

  snapshot(iteration: number): PolicySnapshot | undefined {
    return this.snapshots[iteration];
  }

  history(): readonly PolicySnapshot[] {
    return [...this.snapshots];
  }

  /**
   * Ensure at least `target` snapshots are cached.
   *
   * @throws InvalidIterationCountError if target is not a non-negative integer
   * @throws UnknownDestinationStateError if an action leads outside the model
   */
  extend(target: number): void {
    if (!Number.isInteger(target) || target < 0) {
      throw new InvalidIterationCountError(target);
    }
    if (target <= this.snapshots.length) {
      return;
    }

    const from = this.snapshots.length;
    const pending: PolicySnapshot[] = [];
    let previous = this.snapshots[from - 1] ?? new Map<string, PolicyEntry>();

    for (let iteration = from; iteration < target; iteration++) {
      const next = this.backup(previous);
      pending.push(next);
      previous = next;
      this.logger?.debug('Computed iteration', { iteration, states: next.size });
    }

    this.snapshots.push(...pending);

    if (this.onIteration) {
      pending.forEach((snapshot, offset) => {
        this.onIteration?.({ iteration: from + offset, snapshot });
      });
    }
  }

  /**
   * One Bellman backup over all states. Reads only `previous`.
   */
  private backup(previous: PolicySnapshot): PolicySnapshot {
    const next = new Map<string, PolicyEntry>();
    for (const [name, state] of this.states) {
      const choice = selectBestAction(state, previous);
      next.set(
        name,
        Object.freeze({
          action: choice.action,
          value: state.reward + this.discount * choice.expected,
        })
      );
    }
    return next;
  }
}
