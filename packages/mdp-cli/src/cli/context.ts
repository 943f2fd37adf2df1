/**
 * Command context - what a command may touch besides its arguments
 */

import type { ILogger } from '@bellman/mdp-contracts';

export interface CommandUI {
  /** Result output (stdout) */
  write(text: string): void;
  /** Usage and error messages (stderr) */
  error(text: string): void;
}

export interface CommandContext {
  cwd: string;
  ui: CommandUI;
  /** Overrides the config-driven console logger */
  logger?: ILogger;
}

export type CommandResult<TResponse> = { exitCode: number; response?: TResponse };

export function createProcessContext(): CommandContext {
  return {
    cwd: process.cwd(),
    ui: {
      write: (text) => {
        process.stdout.write(text);
      },
      error: (text) => {
        process.stderr.write(text);
      },
    },
  };
}
