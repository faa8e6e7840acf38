import { Command, Option } from 'commander'
import { JsonAccountSource } from './services/accounts/json-account-source'
import { LogRing } from './services/diagnostics/log-ring'
import { runExport, type ExportFormat } from './services/export/export-driver'
import { errorMessage } from './services/export/errors'
import { getAccountsFilePath, getSettingsFilePath } from './services/platform/app-paths'
import { SettingsStore } from './services/settings/settings-store'

const logger = LogRing.getInstance()
const PROGRAM_NAME = 'bw-vault-export'
const INTERRUPTED_EXIT_CODE = 130

interface CliOptions {
  accounts?: string
  settings?: string
  output?: string
  format: ExportFormat
  verbose: boolean
}

const DEFAULT_OUTPUT: Record<ExportFormat, string> = { json: 'bw.json', csv: 'bw.csv' }

/** Builds the command-line program. Exported so tests can drive it without spawning a process. */
export function createProgram(): Command {
  return new Command(PROGRAM_NAME)
    .description('Export accounts to a Bitwarden import file.')
    .option('-a, --accounts <path>', 'accounts file (default: accounts.json in the config directory)')
    .option('-s, --settings <path>', 'settings file (default: settings.json in the config directory)')
    .option('-o, --output <path>', 'output file (default: bw.json, or bw.csv with --format csv)')
    .addOption(new Option('-f, --format <format>', 'import format').choices(['json', 'csv']).default('json'))
    .option('-v, --verbose', 'echo the log to stderr', false)
    .action(async (options: CliOptions) => {
      if (options.verbose) {
        logger.setSink((entry) => process.stderr.write(`${LogRing.format(entry)}\n`))
      }

      const settings = await SettingsStore.getInstance().load(options.settings ?? getSettingsFilePath())
      const summary = await runExport({
        source: new JsonAccountSource(options.accounts ?? getAccountsFilePath()),
        settings,
        outputPath: options.output ?? DEFAULT_OUTPUT[options.format],
        format: options.format
      })

      const folder = summary.folder ? ` in folder "${summary.folder}"` : ''
      process.stdout.write(`Exported ${summary.itemCount} items${folder} to ${summary.outputPath}.\n`)
    })
}

/**
 * Runs the program, reporting failures on stderr and through the exit code.
 * A failed run also flushes the log ring to the logs directory.
 */
export async function main(argv: string[]): Promise<void> {
  const onInterrupt = (): void => {
    process.stderr.write('Killed by user.\n')
    process.exit(INTERRUPTED_EXIT_CODE)
  }
  process.once('SIGINT', onInterrupt)

  try {
    await createProgram().parseAsync(argv)
  } catch (err) {
    logger.error('Run failed', err)
    process.stderr.write(`${PROGRAM_NAME}: ${errorMessage(err)}\n`)
    try {
      process.stderr.write(`Log written to ${logger.flush()}.\n`)
    } catch (flushErr) {
      process.stderr.write(`${errorMessage(flushErr)}\n`)
    }
    process.exitCode = 1
  } finally {
    process.removeListener('SIGINT', onInterrupt)
  }
}
