import { VaultItemSchema } from '@shared/schemas/vault-document.schema'
import type { Settings } from '@shared/schemas/settings.schema'
import type { Account, AccountSource } from '../accounts/types'
import { LogRing } from '../diagnostics/log-ring'
import { atomicWriteFile } from '../platform/atomic-fs'
import { renderFolderName } from '../settings/settings-store'
import { toBitwardenCsv } from './csv-exporter'
import { ExportError, ExportErrorCode, errorMessage } from './errors'
import { deriveFolderId } from './identifiers'
import { assembleRecord } from './record-assembler'
import type { FolderContext, OutputRecord, VaultDocument } from './types'

const logger = LogRing.getInstance()

/** Permission bits of the written export: it holds every exported secret. */
export const EXPORT_FILE_MODE = 0o600

export type ExportFormat = 'json' | 'csv'

/** Summary of a completed export run. */
export interface ExportSummary {
  outputPath: string
  itemCount: number
  skippedCount: number
  folder: string | null
}

/**
 * Turns accounts into a Bitwarden vault document.
 *
 * The document is only returned (and only written) once every account has
 * been assembled; the first error aborts the whole run.
 */
export class VaultExporter {
  constructor(private readonly settings: Settings) {}

  /** The folder items are grouped under, or `null` when the template renders empty. */
  folderFor(now: Date): FolderContext | null {
    const name = renderFolderName(this.settings.folder, now)
    if (!name) {
      return null
    }
    return { id: deriveFolderId(this.settings.uuid, name), name }
  }

  /**
   * Assembles one item per account that declares an export mapping.
   * Accounts without one are skipped.
   *
   * @throws ExportError on the first account that cannot be assembled.
   */
  build(accounts: readonly Account[], now: Date = new Date()): VaultDocument {
    const folder = this.folderFor(now)
    const items: OutputRecord[] = []

    for (const account of accounts) {
      if (!account.exportSpec) {
        logger.debug('Skipping account without export mapping', { account: account.className })
        continue
      }
      const record = assembleRecord(account, account.exportSpec, folder)
      validateItem(account, record)
      items.push(record)
    }

    logger.info('Vault document assembled', {
      items: items.length,
      skipped: accounts.length - items.length,
      folder: folder?.name ?? null
    })

    const document: VaultDocument = { items }
    if (folder) {
      document.folders = [{ id: folder.id, name: folder.name }]
    }
    return document
  }

  /** Renders the document in the requested import format. */
  serialize(document: VaultDocument, format: ExportFormat): string {
    return format === 'csv' ? toBitwardenCsv(document) : JSON.stringify(document, null, 2)
  }

  /**
   * Writes the serialized document, readable by its owner only.
   *
   * @throws ExportError WRITE_FAILED carrying the underlying system error text.
   */
  async write(outputPath: string, content: string): Promise<void> {
    try {
      await atomicWriteFile(outputPath, content, { mode: EXPORT_FILE_MODE })
      logger.info('Export written', { path: outputPath })
    } catch (err) {
      logger.error('Failed to write export', { path: outputPath, error: errorMessage(err) })
      throw new ExportError(ExportErrorCode.WRITE_FAILED, errorMessage(err), {}, err)
    }
  }

  /**
   * Assembles, serializes and writes the accounts in one go.
   * Nothing is written unless every account assembled cleanly.
   */
  async export(
    accounts: readonly Account[],
    outputPath: string,
    format: ExportFormat,
    now: Date = new Date()
  ): Promise<ExportSummary> {
    let document: VaultDocument
    let content: string
    try {
      document = this.build(accounts, now)
      content = this.serialize(document, format)
    } catch (err) {
      logger.error('Export aborted', { error: errorMessage(err) })
      throw err
    }

    await this.write(outputPath, content)

    return {
      outputPath,
      itemCount: document.items.length,
      skippedCount: accounts.length - document.items.length,
      folder: document.folders?.[0]?.name ?? null
    }
  }
}

function validateItem(account: Account, record: OutputRecord): void {
  const result = VaultItemSchema.safeParse(record)
  if (result.success) return

  const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
  throw new ExportError(
    ExportErrorCode.INVALID_VALUE,
    `item does not match the import format:\n${issues.join('\n')}`,
    { account: account.className }
  )
}

/** Everything one export run needs. */
export interface ExportRun {
  source: AccountSource
  settings: Settings
  outputPath: string
  format: ExportFormat
  now?: Date
}

/**
 * Full pipeline: load accounts, then hand them to {@link VaultExporter.export}.
 */
export async function runExport(run: ExportRun): Promise<ExportSummary> {
  const accounts = await run.source.load()
  return new VaultExporter(run.settings).export(accounts, run.outputPath, run.format, run.now)
}
