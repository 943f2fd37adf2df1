/**
 * @module @bellman/mdp-cli
 * Command-line front end for @bellman/mdp-core.
 */

export * from './cli/commands/index.js';
export { createProcessContext } from './cli/context.js';
export type { CommandContext, CommandUI, CommandResult } from './cli/context.js';
