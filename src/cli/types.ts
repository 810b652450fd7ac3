/**
 * Shared types for CLI commands.
 */

export interface Command {
  name: string;
  description: string;
  usage: string;
  handler: (args: string[]) => Promise<void>;
}

/** Process exit codes used by the commands */
export const ExitCode = {
  RUNTIME_ERROR: 1,
  USAGE: 2,
  INVALID_CONFIG: 3,
} as const;
