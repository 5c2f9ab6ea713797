/** Details about a failed invocation of the external executable. */
interface ExternalToolErrorDetails {
  /** Process exit code, null when it never started or was killed. */
  exitCode: number | null

  /** Signal that terminated the process, if any. */
  signal: NodeJS.Signals | null

  /** Underlying spawn error, when the process could not start. */
  cause?: unknown

  /** Captured standard error, empty when not captured. */
  stderr?: string

  /** Executable name. */
  executable: string

  /** Arguments passed to the executable. */
  args: string[]
}

/**
 * Thrown when the external executable cannot be started, exits with a non-zero
 * status or is killed by a signal.
 */
export class ExternalToolError extends Error {
  public readonly exitCode: number | null
  public readonly signal: NodeJS.Signals | null
  public readonly executable: string
  public readonly stderr: string
  public readonly args: string[]

  /**
   * Creates a new ExternalToolError.
   *
   * @param details - What was run and how it ended.
   */
  public constructor(details: ExternalToolErrorDetails) {
    let command = [details.executable, ...details.args].join(' ')
    let reason: string
    if (details.exitCode !== null) {
      reason = `exited with code ${details.exitCode}`
    } else if (details.signal) {
      reason = `was terminated by ${details.signal}`
    } else {
      reason = 'could not be started'
    }
    super(`Command "${command}" ${reason}`, { cause: details.cause })
    this.name = 'ExternalToolError'
    this.executable = details.executable
    this.exitCode = details.exitCode
    this.signal = details.signal
    this.stderr = details.stderr ?? ''
    this.args = details.args
  }
}
