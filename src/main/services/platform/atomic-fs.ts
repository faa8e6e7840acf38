import { readFile, writeFile, rename, copyFile, unlink, open, chmod } from 'fs/promises'
import { dirname, join } from 'path'
import { randomBytes } from 'crypto'
import { platform } from 'os'
import { mkdirSync, existsSync } from 'fs'
import lockfile from 'proper-lockfile'

const WINDOWS_RETRY_COUNT = 3
const WINDOWS_MAX_JITTER_MS = 2000

/** Options for {@link atomicWriteFile}. */
export interface AtomicWriteOptions {
  /** Permission bits for the written file, e.g. `0o600`. Left to the umask when omitted. */
  mode?: number
}

function getTmpPath(targetPath: string): string {
  return join(dirname(targetPath), `.tmp-${randomBytes(8).toString('hex')}`)
}

function randomJitter(maxMs: number): Promise<void> {
  const ms = Math.floor(Math.random() * maxMs)
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Writes `content` to `filePath`, applies `mode`, and flushes it to disk.
 * The mode is set explicitly since `writeFile` only applies it to new files.
 */
async function writeSynced(filePath: string, content: string, mode?: number): Promise<void> {
  await writeFile(filePath, content, { encoding: 'utf-8', mode })
  if (mode !== undefined) {
    await chmod(filePath, mode)
  }

  const handle = await open(filePath, 'r')
  try {
    await handle.sync()
  } finally {
    await handle.close()
  }
}

/**
 * Renames the temp file over the target.
 *
 * On Windows, antivirus and indexing services can briefly lock files,
 * causing rename to fail with EPERM/EACCES; the rename is retried with random
 * jitter before falling back to copy+unlink.
 */
async function atomicRename(tmpPath: string, targetPath: string, mode?: number): Promise<void> {
  if (platform() !== 'win32') {
    await rename(tmpPath, targetPath)
    return
  }

  for (let attempt = 1; attempt <= WINDOWS_RETRY_COUNT; attempt++) {
    try {
      await rename(tmpPath, targetPath)
      return
    } catch (err) {
      const code = (err as NodeJS.ErrnoException).code
      if (code !== 'EPERM' && code !== 'EACCES') {
        throw err
      }
      if (attempt < WINDOWS_RETRY_COUNT) {
        await randomJitter(WINDOWS_MAX_JITTER_MS)
      }
    }
  }

  await copyFile(tmpPath, targetPath)
  if (mode !== undefined) {
    await chmod(targetPath, mode)
  }
  await unlink(tmpPath)
}

/**
 * Writes content to a file atomically: temp file -> fsync -> rename.
 *
 * Readers never see a partially-written file. When the target already exists
 * it is locked with proper-lockfile for the duration of the write.
 *
 * @example
 * ```ts
 * await atomicWriteFile('/home/me/bw.json', JSON.stringify(vault, null, 2), { mode: 0o600 })
 * ```
 */
export async function atomicWriteFile(
  targetPath: string,
  content: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const { mode } = options
  mkdirSync(dirname(targetPath), { recursive: true })

  // proper-lockfile needs an existing file to lock; a new file has no readers yet.
  if (!existsSync(targetPath)) {
    await writeSynced(targetPath, content, mode)
    return
  }

  const release = await lockfile
    .lock(targetPath, {
      realpath: false,
      retries: { retries: 5, minTimeout: 100, maxTimeout: 1000 },
      lockfilePath: `${targetPath}.lock`
    })
    .catch((lockErr: unknown) => {
      throw new Error(
        `Failed to acquire lock for "${targetPath}": ${lockErr instanceof Error ? lockErr.message : String(lockErr)}`
      )
    })

  const tmpPath = getTmpPath(targetPath)

  try {
    await writeSynced(tmpPath, content, mode)
    await atomicRename(tmpPath, targetPath, mode)
  } catch (err) {
    // temp file cleanup is best-effort
    await unlink(tmpPath).catch(() => undefined)
    throw new Error(
      `Atomic write to "${targetPath}" failed: ${err instanceof Error ? err.message : String(err)}`
    )
  } finally {
    // lock release is best-effort
    await release().catch(() => undefined)
  }
}

/**
 * Reads a UTF-8 file, turning the common errno codes into readable messages.
 *
 * @throws If the file does not exist or cannot be read.
 */
export async function atomicReadFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, { encoding: 'utf-8' })
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code

    if (code === 'ENOENT') {
      throw new Error(`File not found: "${filePath}"`)
    }
    if (code === 'EACCES') {
      throw new Error(`Permission denied reading "${filePath}"`)
    }

    throw new Error(
      `Failed to read "${filePath}": ${err instanceof Error ? err.message : String(err)}`
    )
  }
}
