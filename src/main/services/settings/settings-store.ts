/**
 * Loads the persisted export settings, creating them on first run.
 *
 * The settings hold the identity seed every generated identifier derives from,
 * so the file is created once and then only read. Writes are atomic and the
 * file is readable by its owner only.
 */

import { existsSync } from 'fs'
import { randomUUID } from 'crypto'
import dayjs from 'dayjs'
import { DEFAULT_FOLDER_TEMPLATE, SettingsSchema, type Settings } from '@shared/schemas/settings.schema'
import { LogRing } from '../diagnostics/log-ring'
import { ExportError, ExportErrorCode, errorMessage } from '../export/errors'
import { getSettingsFilePath } from '../platform/app-paths'
import { atomicReadFile, atomicWriteFile } from '../platform/atomic-fs'

const logger = LogRing.getInstance()
const SETTINGS_FILE_MODE = 0o600

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Renders the folder template against `now`. Bracketed text is literal, the
 * rest are dayjs format tokens: `[Avendesora-]YYMMDD` on 19 Oct 2026 gives
 * `Avendesora-261019`. An empty template disables the folder.
 */
export function renderFolderName(template: string, now: Date = new Date()): string {
  if (!template.trim()) {
    return ''
  }
  return dayjs(now).format(template).trim()
}

export class SettingsStore {
  private static instance: SettingsStore | null = null

  private constructor() {}

  /** Returns the singleton SettingsStore instance. */
  static getInstance(): SettingsStore {
    if (!SettingsStore.instance) {
      SettingsStore.instance = new SettingsStore()
    }
    return SettingsStore.instance
  }

  /**
   * Reads the settings file, creating it or filling in missing keys as needed.
   *
   * @param filePath - Settings file; defaults to `settings.json` in the config directory.
   * @throws ExportError SETTINGS_INVALID if the file cannot be read or fails validation.
   */
  async load(filePath: string = getSettingsFilePath()): Promise<Settings> {
    try {
      const raw = existsSync(filePath) ? await this.readRaw(filePath) : {}
      const completed = { ...raw }
      let changed = false

      if (completed['uuid'] === undefined) {
        completed['uuid'] = randomUUID()
        changed = true
        logger.info('Generated new identity seed', { path: filePath })
      }
      if (completed['folder'] === undefined) {
        completed['folder'] = DEFAULT_FOLDER_TEMPLATE
        changed = true
      }

      const result = SettingsSchema.safeParse(completed)
      if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
        throw new ExportError(
          ExportErrorCode.SETTINGS_INVALID,
          `${filePath} failed validation:\n${issues.join('\n')}`
        )
      }

      if (changed) {
        await atomicWriteFile(filePath, JSON.stringify(result.data, null, 2), {
          mode: SETTINGS_FILE_MODE
        })
        logger.info('Settings written', { path: filePath })
      }

      return result.data
    } catch (err) {
      logger.error('Failed to load settings', { path: filePath, error: errorMessage(err) })
      if (err instanceof ExportError) {
        throw err
      }
      throw new ExportError(ExportErrorCode.SETTINGS_INVALID, errorMessage(err), {}, err)
    }
  }

  private async readRaw(filePath: string): Promise<Record<string, unknown>> {
    const parsed: unknown = JSON.parse(await atomicReadFile(filePath))
    if (!isPlainObject(parsed)) {
      throw new Error(`${filePath}: expected a JSON object`)
    }
    return parsed
  }
}
