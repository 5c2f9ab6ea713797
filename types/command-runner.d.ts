/**
 * Single seam between the tool and the external version-control executable.
 *
 * Every git operation receives a runner instead of spawning processes itself,
 * so tests can pass a double and never touch a real repository.
 */
export interface CommandRunner {
  /**
   * Run the executable and capture its standard output.
   *
   * Resolves with stdout split into lines, terminators stripped and trailing
   * empty entries removed. Rejects with `ExternalToolError` when the process
   * cannot start or exits unsuccessfully.
   */
  run(args: string[]): Promise<string[]>

  /**
   * Run the executable with the terminal attached (stdin, stdout and stderr
   * inherited) and wait for it to exit. Nothing is captured.
   */
  call(args: string[]): Promise<void>
}
