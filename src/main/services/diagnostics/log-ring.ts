import { join } from 'path'
import { writeFileSync } from 'fs'
import { getLogsPath } from '../platform/app-paths'

/** Severity levels for log entries. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** A single structured log entry. */
export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  data?: unknown
}

/** Receives every entry as it is logged. */
export type LogSink = (entry: LogEntry) => void

const MAX_ENTRIES = 500

/**
 * In-memory logger keeping the last {@link MAX_ENTRIES} entries of a run.
 *
 * Entries stay in memory unless a sink is attached (the CLI attaches one that
 * writes to stderr under `--verbose`) or the ring is flushed to the logs
 * directory after a failed run.
 *
 * @example
 * ```ts
 * const logger = LogRing.getInstance()
 * logger.info('Accounts loaded', { count: 12 })
 * logger.error('Export failed', { account: 'BankOfAmerica', field: 'exp' })
 *
 * const path = logger.flush()
 * ```
 */
export class LogRing {
  private static instance: LogRing | null = null

  private entries: LogEntry[] = []
  private sink: LogSink | null = null

  private constructor() {}

  /** Returns the singleton LogRing instance, creating it on first access. */
  static getInstance(): LogRing {
    if (!LogRing.instance) {
      LogRing.instance = new LogRing()
    }
    return LogRing.instance
  }

  debug(message: string, data?: unknown): void {
    this.append('debug', message, data)
  }

  info(message: string, data?: unknown): void {
    this.append('info', message, data)
  }

  warn(message: string, data?: unknown): void {
    this.append('warn', message, data)
  }

  error(message: string, data?: unknown): void {
    this.append('error', message, data)
  }

  /** Attaches (or with `null`, detaches) a sink that sees every new entry. */
  setSink(sink: LogSink | null): void {
    this.sink = sink
  }

  /**
   * Returns the most recent entries, oldest first.
   *
   * @param count - Number of entries to return. Defaults to all stored entries.
   */
  getEntries(count?: number): LogEntry[] {
    return count === undefined ? [...this.entries] : this.entries.slice(-count)
  }

  /**
   * Writes all buffered entries to a timestamped JSON file in the logs directory.
   *
   * @returns Absolute path to the written log file.
   * @throws If writing to disk fails.
   */
  flush(): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-')
    const filePath = join(getLogsPath(), `export-${timestamp}.json`)

    try {
      writeFileSync(filePath, JSON.stringify(this.entries, null, 2), { encoding: 'utf-8', mode: 0o600 })
    } catch (err) {
      throw new Error(
        `Failed to flush log ring to "${filePath}": ${err instanceof Error ? err.message : String(err)}`
      )
    }

    return filePath
  }

  /** One-line rendering used by the stderr sink. */
  static format(entry: LogEntry): string {
    const data = entry.data === undefined ? '' : ` ${JSON.stringify(entry.data)}`
    return `${entry.timestamp} ${entry.level.toUpperCase().padEnd(5)} ${entry.message}${data}`
  }

  private append(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      data: data !== undefined ? serializeData(data) : undefined
    }

    this.entries.push(entry)
    if (this.entries.length > MAX_ENTRIES) {
      this.entries.shift()
    }
    this.sink?.(entry)
  }
}

/** Converts Error instances, including their cause chain, to plain objects. */
function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return {
      name: data.name,
      message: data.message,
      stack: data.stack,
      cause: data.cause !== undefined ? serializeData(data.cause) : undefined
    }
  }
  return data
}
