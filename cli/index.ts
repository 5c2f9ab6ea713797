import { createSpinner } from 'nanospinner'
import pc from 'picocolors'
import cac from 'cac'

import type { GitClient } from '../types/git-client'

import { createCommandRunner } from '../core/runner/create-command-runner'
import { confirmSendEmail } from '../core/interactive/confirm-send-email'
import { getNextSeriesTag } from '../core/series/get-next-series-tag'
import { createGitClient } from '../core/git/create-git-client'
import { normalizeListOption } from './normalize-list-option'
import { mergeProfile } from '../core/config/merge-profile'
import { readProfile } from '../core/config/read-profile'
import { readToggleOption } from './read-toggle-option'
import { printCliError } from './print-cli-error'
import { printCommand } from './print-command'
import { version } from '../package.json'

/** Options accepted by every command. */
interface GlobalOptions {
  /** Print each git command before running it. */
  verbose?: boolean

  /** Directory to run git in. */
  cwd?: string
}

/** Options of the `tag` command. */
interface TagOptions extends GlobalOptions {
  /** Message file for an annotated tag. */
  annotate?: string

  /** Series name used when no tag name is given. */
  topic?: string
}

/** Options of the `format-patch` command. */
interface FormatPatchCommandOptions extends GlobalOptions {
  outputDirectory?: string
  subjectPrefix?: string
  profile?: string
}

/** Options of the `send-email` command. */
interface SendEmailCommandOptions extends GlobalOptions {
  cc?: string[] | string
  to?: string[] | string
  dryRun?: boolean
  profile?: string
  yes?: boolean
}

/**
 * Create a git client for the directory selected on the command line.
 *
 * @param options - Global CLI options.
 * @returns Client bound to a process-backed runner.
 */
function createClient(options: GlobalOptions): GitClient {
  return createGitClient(
    createCommandRunner({
      onCommand: options.verbose ? printCommand : undefined,
      cwd: options.cwd,
    }),
  )
}

/**
 * Run a command body, reporting failures and exiting with status 1.
 *
 * @param task - Command body.
 */
async function guard(task: () => Promise<void>): Promise<void> {
  try {
    await task()
  } catch (error) {
    printCliError(error)
    process.exit(1)
  }
}

/**
 * Print lines to stdout.
 *
 * @param lines - Lines to print.
 */
function printLines(lines: string[]): void {
  for (let line of lines) {
    console.info(line)
  }
}

/** Run the CLI. */
export function run(): void {
  let cli = cac('git-patchset')

  cli
    .help()
    .version(version)
    .option('--cwd <directory>', 'Run git in another directory')
    .option('--verbose', 'Print every git command before running it')

  cli
    .command('branch', 'Print the current branch')
    .action((options: GlobalOptions) =>
      guard(async () => {
        console.info(await createClient(options).getCurrentBranch())
      }),
    )

  cli
    .command('tags [pattern]', 'List tags, optionally matching a glob')
    .action((pattern: undefined | string, options: GlobalOptions) =>
      guard(async () => {
        printLines(await createClient(options).getTags(pattern))
      }),
    )

  cli
    .command('tag-message <tag>', 'Print the message of an annotated tag')
    .action((tag: string, options: GlobalOptions) =>
      guard(async () => {
        printLines(await createClient(options).getTagMessage(tag))
      }),
    )

  cli
    .command('log <revisions>', 'One-line log of a revision range')
    .action((revisions: string, options: GlobalOptions) =>
      guard(async () => {
        printLines(await createClient(options).getLog(revisions))
      }),
    )

  cli
    .command('tag [name]', 'Tag HEAD as a patch series revision')
    .option('--annotate <file>', 'Create an annotated tag from a message file')
    .option('--topic <topic>', 'Series name (default: current branch)')
    .action((name: undefined | string, options: TagOptions) =>
      guard(async () => {
        let client = createClient(options)
        let tagName = name
        if (!tagName) {
          let topic = options.topic ?? (await client.getCurrentBranch())
          let existing = await client.getTags(`${topic}-v*`)
          tagName = getNextSeriesTag(topic, existing)
        }

        await client.createTag(tagName, options.annotate)
        console.info(pc.green(`✓ Created tag ${pc.bold(tagName)}`))
      }),
    )

  cli
    .command('format-patch <revisions>', 'Export a revision range as patches')
    .option('--subject-prefix <prefix>', 'Subject prefix (e.g. RFC)')
    .option('--output-directory <directory>', 'Write patches to a directory')
    .option('--numbered', 'Number patches as [n/m]')
    .option('--no-numbered', 'Do not number patches, even if the profile does')
    .option('--cover-letter', 'Generate a cover letter')
    .option('--no-cover-letter', 'Skip the cover letter set by the profile')
    .option('--notes', 'Append git-notes to each patch')
    .option('--no-notes', 'Leave out git-notes set by the profile')
    .option('--profile <name>', 'Profile from .patchset.yml')
    .action((revisions: string, options: FormatPatchCommandOptions) =>
      guard(async () => {
        let client = createClient(options)
        let profile = await readProfile(
          await client.getRepositoryRoot(),
          options.profile,
        )
        let settings = mergeProfile(profile, {
          outputDirectory: options.outputDirectory,
          subjectPrefix: options.subjectPrefix,
          coverLetter: readToggleOption(cli.rawArgs, 'cover-letter'),
          numbered: readToggleOption(cli.rawArgs, 'numbered'),
          notes: readToggleOption(cli.rawArgs, 'notes'),
        })

        let spinner = createSpinner('Generating patches...').start()
        let files: string[]
        try {
          files = await client.formatPatch(revisions, {
            outputDirectory: settings.outputDirectory,
            subjectPrefix: settings.subjectPrefix,
            coverLetter: settings.coverLetter,
            numbered: settings.numbered,
            notes: settings.notes,
          })
        } catch (error) {
          spinner.error('Failed')
          throw error
        }

        spinner.success(`Wrote ${pc.yellow(files.length)} patches`)
        for (let file of files) {
          console.info(pc.gray(`   ${file}`))
        }
      }),
    )

  cli
    .command('send-email <target>', 'Email patches with git send-email')
    .option('--to <address>', 'Recipient (repeatable)')
    .option('--cc <address>', 'Carbon-copy recipient (repeatable)')
    .option('--dry-run', 'Do everything except actually send the emails')
    .option('--yes, -y', 'Skip the confirmation')
    .option('--profile <name>', 'Profile from .patchset.yml')
    .action((target: string, options: SendEmailCommandOptions) =>
      guard(async () => {
        let client = createClient(options)
        let profile = await readProfile(
          await client.getRepositoryRoot(),
          options.profile,
        )
        let { to, cc } = mergeProfile(profile, {
          to: normalizeListOption(options.to),
          cc: normalizeListOption(options.cc),
        })

        let sendOptions = { dryRun: options.dryRun, target, to, cc }

        if (!options.yes && !options.dryRun) {
          let confirmed = await confirmSendEmail(sendOptions)
          if (!confirmed) {
            console.info(pc.gray('\nNo emails sent'))
            return
          }
        }

        await client.sendEmail(sendOptions)
      }),
    )

  cli.parse()
}
