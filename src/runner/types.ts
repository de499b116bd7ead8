/**
 * Types for running a command with secrets injected into its environment.
 */

/** Spawns a command and resolves with its exit status. */
export interface CommandExecutor {
  execute(command: readonly string[], env: NodeJS.ProcessEnv): Promise<number>;
}

/** The slice of SecretStore that `run` needs. */
export interface EnvironmentSource {
  resolveEnvironment(): Promise<Record<string, string>>;
}

export interface RunResult {
  exitCode: number;
  injected: number;
}
