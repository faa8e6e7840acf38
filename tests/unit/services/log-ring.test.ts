import { describe, it, expect, vi, beforeEach } from 'vitest'

const mockWriteFileSync = vi.fn()

vi.mock('fs', () => ({
  writeFileSync: (...args: unknown[]) => mockWriteFileSync(...args)
}))

vi.mock('../../../src/main/services/platform/app-paths', () => ({
  getLogsPath: () => '/mock/logs'
}))

import { LogRing, type LogEntry } from '../../../src/main/services/diagnostics/log-ring'
import { ExportError, ExportErrorCode } from '../../../src/main/services/export/errors'

describe('LogRing', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    ;(LogRing as unknown as { instance: null }).instance = null
  })

  it('should return entries oldest first', () => {
    const logger = LogRing.getInstance()
    logger.info('first')
    logger.warn('second', { account: 'BankOfTest' })

    expect(logger.getEntries().map((e) => [e.level, e.message, e.data])).toEqual([
      ['info', 'first', undefined],
      ['warn', 'second', { account: 'BankOfTest' }]
    ])
    expect(logger.getEntries(1).map((e) => e.message)).toEqual(['second'])
  })

  it('should keep only the most recent 500 entries', () => {
    const logger = LogRing.getInstance()
    for (let i = 0; i < 502; i++) {
      logger.debug(`entry ${i}`)
    }

    const entries = logger.getEntries()
    expect(entries).toHaveLength(500)
    expect(entries[0].message).toBe('entry 2')
  })

  it('should pass new entries to the attached sink', () => {
    const logger = LogRing.getInstance()
    const seen: LogEntry[] = []
    logger.setSink((entry) => seen.push(entry))
    logger.error('boom')
    logger.setSink(null)
    logger.error('unseen')

    expect(seen.map((e) => e.message)).toEqual(['boom'])
  })

  it('should serialize errors with their cause chain', () => {
    const logger = LogRing.getInstance()
    const cause = new ExportError(ExportErrorCode.INVALID_EXPIRATION, 'bad date.')
    logger.error('Run failed', cause.withCulprit({ account: 'Visa', field: 'exp' }))

    const data = logger.getEntries()[0].data as { message: string; cause: { message: string } }
    expect(data.message).toBe('Visa, exp: bad date.')
    expect(data.cause.message).toBe('bad date.')
  })

  it('should format an entry on one line', () => {
    const line = LogRing.format({
      level: 'warn',
      message: 'Skipping account',
      timestamp: '2026-10-19T08:30:00.000Z',
      data: { account: 'Diary' }
    })

    expect(line).toBe('2026-10-19T08:30:00.000Z WARN  Skipping account {"account":"Diary"}')
  })

  it('should flush entries to a private file in the logs directory', () => {
    const logger = LogRing.getInstance()
    logger.info('done')

    const path = logger.flush()

    expect(path).toMatch(/^\/mock\/logs\/export-.*\.json$/)
    const [writtenPath, content, options] = mockWriteFileSync.mock.calls[0] as [string, string, object]
    expect(writtenPath).toBe(path)
    expect(JSON.parse(content)[0].message).toBe('done')
    expect(options).toEqual({ encoding: 'utf-8', mode: 0o600 })
  })
})
