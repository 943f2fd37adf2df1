/**
 * Error taxonomy.
 *
 * All failures are terminal: nothing here is retried. The CLI maps any
 * BellmanError to exit code 1 and prints `message`.
 */

export type BellmanErrorCode =
  | 'INVALID_DISCOUNT'
  | 'MALFORMED_ACTION_TRIPLE'
  | 'MALFORMED_STATE_LINE'
  | 'UNKNOWN_DESTINATION_STATE'
  | 'INVALID_ITERATION_COUNT'
  | 'CONFIG_ERROR';

export abstract class BellmanError extends Error {
  abstract readonly code: BellmanErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidDiscountError extends BellmanError {
  readonly code = 'INVALID_DISCOUNT';

  constructor(readonly discount: unknown) {
    super(`Discount must be a number between 0 and 1, got ${String(discount)}`);
  }
}

export class MalformedActionTripleError extends BellmanError {
  readonly code = 'MALFORMED_ACTION_TRIPLE';

  /** 1-based line of the model file, when known */
  readonly line?: number;

  constructor(reason: string, line?: number) {
    super(line === undefined ? reason : `Line ${line}: ${reason}`);
    this.line = line;
  }
}

export class MalformedStateLineError extends BellmanError {
  readonly code = 'MALFORMED_STATE_LINE';

  constructor(
    reason: string,
    readonly line: number
  ) {
    super(`Line ${line}: ${reason}`);
  }
}

export class UnknownDestinationStateError extends BellmanError {
  readonly code = 'UNKNOWN_DESTINATION_STATE';

  constructor(
    readonly state: string,
    readonly action: string,
    readonly destination: string
  ) {
    super(`State "${state}" action "${action}" leads to unknown state "${destination}"`);
  }
}

export class InvalidIterationCountError extends BellmanError {
  readonly code = 'INVALID_ITERATION_COUNT';

  constructor(readonly count: unknown) {
    super(`Iteration count must be a non-negative integer, got ${String(count)}`);
  }
}

export class ConfigError extends BellmanError {
  readonly code = 'CONFIG_ERROR';

  constructor(
    message: string,
    readonly path?: string
  ) {
    super(path === undefined ? message : `${path}: ${message}`);
  }
}

export function isBellmanError(error: unknown): error is BellmanError {
  return error instanceof BellmanError;
}
