/**
 * Core MDP types shared by the engine, the parser and the CLI.
 */

/**
 * Destination state name → transition probability.
 */
export type OutcomeTable = ReadonlyMap<string, number>;

/**
 * Action name → outcome table, in order of first appearance.
 * The order matters: it decides ties between equally good actions.
 */
export type ActionTable = ReadonlyMap<string, OutcomeTable>;

/**
 * One decoded `(action destination probability)` group.
 */
export interface ActionTriple {
  action: string;
  destination: string;
  probability: number;
}

/**
 * Read-only view of one state the engine iterates over.
 */
export interface MdpState {
  readonly name: string;
  readonly reward: number;
  readonly actions: ActionTable;
}

/**
 * Chosen action and value of one state at one iteration.
 * `action` is null at iteration 0 and for states without actions.
 */
export interface PolicyEntry {
  readonly action: string | null;
  readonly value: number;
}

/**
 * Full policy-and-value assignment at one iteration, in state order.
 */
export type PolicySnapshot = ReadonlyMap<string, PolicyEntry>;

/**
 * Emitted once per snapshot committed by `PolicyEngine.extend`.
 */
export interface IterationComputedEvent {
  /** 0-based snapshot index */
  iteration: number;
  snapshot: PolicySnapshot;
}
