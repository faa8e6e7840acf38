import { mkdirSync } from 'fs'
import { join } from 'path'
import { homedir, platform } from 'os'

const APP_NAME = 'bw-vault-export'

/**
 * Resolves the platform-specific directory holding settings and accounts.
 *
 * - macOS:   ~/Library/Application Support/bw-vault-export/
 * - Windows: %APPDATA%\bw-vault-export\
 * - Linux:   ~/.config/bw-vault-export/
 *
 * @throws If the current platform is unsupported.
 */
function resolveBaseConfigDir(): string {
  const home = homedir()
  const os = platform()

  switch (os) {
    case 'darwin':
      return join(home, 'Library', 'Application Support', APP_NAME)
    case 'win32':
      return join(process.env['APPDATA'] ?? join(home, 'AppData', 'Roaming'), APP_NAME)
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return join(process.env['XDG_CONFIG_HOME'] ?? join(home, '.config'), APP_NAME)
    default:
      throw new Error(`Unsupported platform: ${os}`)
  }
}

/**
 * Ensures a directory exists, creating it recursively if necessary.
 *
 * @returns The same path, guaranteed to exist on disk.
 */
function ensureDir(dirPath: string): string {
  try {
    mkdirSync(dirPath, { recursive: true })
  } catch (err) {
    throw new Error(
      `Failed to create directory "${dirPath}": ${err instanceof Error ? err.message : String(err)}`
    )
  }
  return dirPath
}

let cachedBasePath: string | null = null

/**
 * Returns (and caches) the configuration root for the current OS.
 * Creates the directory on first access.
 */
export function getConfigPath(): string {
  if (!cachedBasePath) {
    cachedBasePath = ensureDir(resolveBaseConfigDir())
  }
  return cachedBasePath
}

/** @returns `<config>/settings.json` */
export function getSettingsFilePath(): string {
  return join(getConfigPath(), 'settings.json')
}

/** @returns `<config>/accounts.json` */
export function getAccountsFilePath(): string {
  return join(getConfigPath(), 'accounts.json')
}

/** @returns `<config>/logs/` */
export function getLogsPath(): string {
  return ensureDir(join(getConfigPath(), 'logs'))
}
