// ============================================
// Defaults
// ============================================

/** Number of snapshots computed when the caller asks for none in particular */
export const DEFAULT_ITERATIONS = 20;

/** Decimal places of rendered values */
export const DEFAULT_PRECISION = 4;

/** Rendered in place of an action for iteration 0 and action-less states */
export const NO_ACTION_LABEL = 'None';

/** Looked up in the working directory when no --config is given */
export const DEFAULT_CONFIG_FILE = 'bellman.config.yml';
