import enquirer from 'enquirer'
import pc from 'picocolors'

import type { SendEmailOptions } from '../../types/send-email-options'

import { formatRecipients } from './format-recipients'

/** Result shape returned by enquirer for the confirm prompt. */
interface ConfirmResult {
  confirmed: boolean
}

/**
 * Shows who will receive the patches and asks whether to send them.
 *
 * @param options - Send options about to be used.
 * @returns True when the user agreed. Cancelling the prompt counts as no.
 */
export async function confirmSendEmail(
  options: SendEmailOptions,
): Promise<boolean> {
  if (options.to.length === 0 && options.cc.length === 0) {
    console.warn(pc.yellow('\n⚠️  No recipients given, git will ask for them'))
  } else {
    console.info('')
    for (let line of formatRecipients(options.to, options.cc)) {
      console.info(line)
    }
  }

  try {
    let { confirmed } = await enquirer.prompt<ConfirmResult>({
      message: `Send ${options.target}?`,
      name: 'confirmed',
      type: 'confirm',
      initial: false,
    })
    return confirmed
  } catch (error) {
    /** Enquirer rejects with an empty string when the prompt is cancelled. */
    if (!(error instanceof Error) || error.message.includes('cancelled')) {
      return false
    }
    throw error
  }
}
