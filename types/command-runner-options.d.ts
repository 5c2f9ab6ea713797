/** Options accepted by `createCommandRunner`. */
export interface CommandRunnerOptions {
  /** Called with the argument list right before each process is spawned. */
  onCommand?(args: string[]): void

  /** Extra environment for the child process, merged over `process.env`. */
  env?: Record<string, string>

  /** Executable to invoke, resolved through `PATH`. Defaults to `git`. */
  executable?: string

  /** Working directory of the child process. */
  cwd?: string
}
