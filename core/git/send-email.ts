import type { SendEmailOptions } from '../../types/send-email-options'
import type { CommandRunner } from '../../types/command-runner'

/**
 * Build the argument list for `git send-email`.
 *
 * @param options - Recipients and target.
 * @returns Arguments for the runner.
 */
export function buildSendEmailArgs(options: SendEmailOptions): string[] {
  let args = ['send-email']
  if (options.dryRun) {
    args.push('--dry-run')
  }
  for (let address of options.to) {
    args.push('--to', address)
  }
  for (let address of options.cc) {
    args.push('--cc', address)
  }
  args.push(options.target)
  return args
}

/**
 * Send patches by email.
 *
 * The terminal stays attached because git may ask for confirmation or an SMTP
 * password.
 *
 * @param runner - Command runner.
 * @param options - Recipients and target.
 */
export function sendEmail(
  runner: CommandRunner,
  options: SendEmailOptions,
): Promise<void> {
  return runner.call(buildSendEmailArgs(options))
}
