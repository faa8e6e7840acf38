import { describe, it, expect, vi, beforeEach } from 'vitest'

vi.mock('../../../src/main/services/diagnostics/log-ring', () => ({
  LogRing: {
    getInstance: () => ({
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn()
    })
  }
}))

vi.mock('../../../src/main/services/platform/atomic-fs', () => ({
  atomicWriteFile: vi.fn().mockResolvedValue(undefined),
  atomicReadFile: vi.fn()
}))

import { atomicWriteFile } from '../../../src/main/services/platform/atomic-fs'
import { accountsFromJson } from '../../../src/main/services/accounts/json-account-source'
import type { AccountSource } from '../../../src/main/services/accounts/types'
import {
  EXPORT_FILE_MODE,
  VaultExporter,
  runExport
} from '../../../src/main/services/export/export-driver'
import { ExportError, ExportErrorCode } from '../../../src/main/services/export/errors'

const SEED = '5f0a3c2e-8d41-4b7a-9c6e-2f1d0b3a4e57'
const OTHER_SEED = '0b9d6e14-3c2a-4f58-8e71-6a5b4c3d2e1f'
const NOW = new Date(2026, 9, 19, 12, 0, 0)

const ACCOUNTS = {
  accounts: [
    {
      name: 'bank',
      class: 'BankOfTest',
      fields: { username: 'jdoe', passcode: 'test-secret' },
      bitwarden: { name: 'Bank of Test', type: 'login', username: '{username}', password: '{passcode}' }
    },
    { name: 'unexported', class: 'Unexported', fields: { passcode: 'test-secret' } },
    {
      name: 'visa',
      class: 'Visa',
      bitwarden: { name: 'Visa', type: 'card', ccn: '4111111111111111', exp: '07/2025' }
    }
  ]
}

function sourceOf(content: unknown): AccountSource {
  return { load: vi.fn().mockResolvedValue(accountsFromJson(content)) }
}

describe('VaultExporter', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('should render the folder from the template and derive its id from the seed', () => {
    const exporter = new VaultExporter({ uuid: SEED, folder: '[Avendesora-]YYMMDD' })

    expect(exporter.folderFor(NOW)).toEqual({
      id: '8f07f1a0-2ac8-5bec-a61c-e6c13c523f3d',
      name: 'Avendesora-261019'
    })
  })

  it('should assemble exported accounts and skip the rest', () => {
    const exporter = new VaultExporter({ uuid: SEED, folder: '[Avendesora-]YYMMDD' })
    const document = exporter.build(accountsFromJson(ACCOUNTS), NOW)

    expect(document.folders).toEqual([{ id: '8f07f1a0-2ac8-5bec-a61c-e6c13c523f3d', name: 'Avendesora-261019' }])
    expect(document.items.map((item) => item['name'])).toEqual(['Bank of Test', 'Visa'])
    expect(document.items[0]['id']).toBe('f0dd57f5-8751-50f0-b971-b366f144bee6')
    expect(document.items[1]['id']).toBe('a75a460c-9c14-504f-940e-7c1df6e42c40')
    expect(Object.keys(document)).toEqual(['items', 'folders'])
  })

  it('should produce byte-identical output on repeated runs with the same seed', () => {
    const exporter = new VaultExporter({ uuid: SEED, folder: '[Avendesora-]YYMMDD' })
    const first = exporter.serialize(exporter.build(accountsFromJson(ACCOUNTS), NOW), 'json')
    const second = exporter.serialize(exporter.build(accountsFromJson(ACCOUNTS), NOW), 'json')

    expect(second).toBe(first)
  })

  it('should change only the identifiers when the seed changes', () => {
    const strip = ({ id: _id, folderId: _folderId, ...rest }: Record<string, unknown>) => rest
    const a = new VaultExporter({ uuid: SEED, folder: '[Avendesora-]YYMMDD' }).build(accountsFromJson(ACCOUNTS), NOW)
    const b = new VaultExporter({ uuid: OTHER_SEED, folder: '[Avendesora-]YYMMDD' }).build(accountsFromJson(ACCOUNTS), NOW)

    expect(b.folders?.[0].id).toBe('73e3cb69-231c-52b8-a1c1-8890bda46731')
    expect(b.items[0]['id']).toBe('ced1ca6a-3e34-5962-a5f1-6a46656b9367')
    expect(b.items.map(strip)).toEqual(a.items.map(strip))
  })

  it('should leave out folders and identifiers when the template is empty', () => {
    const exporter = new VaultExporter({ uuid: SEED, folder: '' })
    const document = exporter.build(accountsFromJson(ACCOUNTS), NOW)

    expect(document).not.toHaveProperty('folders')
    for (const item of document.items) {
      expect(item).not.toHaveProperty('id')
      expect(item).not.toHaveProperty('folderId')
    }
  })

  it('should serialize JSON with two-space indentation', () => {
    const exporter = new VaultExporter({ uuid: SEED, folder: '' })
    const document = exporter.build(
      accountsFromJson({ accounts: [{ name: 'diary', bitwarden: { name: 'Diary', type: 'note' } }] }),
      NOW
    )

    expect(exporter.serialize(document, 'json')).toBe(
      '{\n  "items": [\n    {\n      "type": 2,\n      "secureNote": {},\n      "name": "Diary"\n    }\n  ]\n}'
    )
  })

  it('should reject an item whose values do not fit the import format', () => {
    const exporter = new VaultExporter({ uuid: SEED, folder: '' })
    const accounts = accountsFromJson({
      accounts: [{ name: 'odd', class: 'Odd', bitwarden: { name: 'Odd', type: 'note', notes: ['a', 'b'] } }]
    })

    expect(() => exporter.build(accounts, NOW)).toThrow(/^Odd: item does not match the import format:\nnotes: /)
  })

  it('should export a CSV file without going through an account source', async () => {
    const exporter = new VaultExporter({ uuid: SEED, folder: '' })
    const accounts = accountsFromJson({
      accounts: [{ name: 'diary', class: 'Diary', bitwarden: { name: 'Diary', type: 'note', notes: 'dear diary' } }]
    })

    const summary = await exporter.export(accounts, 'bw.csv', 'csv', NOW)

    expect(summary).toEqual({ outputPath: 'bw.csv', itemCount: 1, skippedCount: 0, folder: null })
    const [path, content, options] = vi.mocked(atomicWriteFile).mock.calls[0]
    expect(path).toBe('bw.csv')
    expect(options).toEqual({ mode: EXPORT_FILE_MODE })
    expect(content.split('\n')[1]).toBe(',,note,Diary,dear diary,,0,,,,')
  })
})

describe('runExport', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('should write the document readable by its owner only', async () => {
    const summary = await runExport({
      source: sourceOf(ACCOUNTS),
      settings: { uuid: SEED, folder: '[Avendesora-]YYMMDD' },
      outputPath: 'bw.json',
      format: 'json',
      now: NOW
    })

    expect(summary).toEqual({ outputPath: 'bw.json', itemCount: 2, skippedCount: 1, folder: 'Avendesora-261019' })
    expect(atomicWriteFile).toHaveBeenCalledTimes(1)
    const [path, content, options] = vi.mocked(atomicWriteFile).mock.calls[0]
    expect(path).toBe('bw.json')
    expect(options).toEqual({ mode: EXPORT_FILE_MODE })
    expect(JSON.parse(content).items).toHaveLength(2)
  })

  it('should write nothing when any account fails', async () => {
    const source = sourceOf({
      accounts: [
        ACCOUNTS.accounts[0],
        { name: 'broken', class: 'Broken', bitwarden: { name: 'Broken', type: 'login', foo: 'bar' } }
      ]
    })

    await expect(
      runExport({ source, settings: { uuid: SEED, folder: '' }, outputPath: 'bw.json', format: 'json', now: NOW })
    ).rejects.toThrow('Broken, foo: unknown field.')
    expect(atomicWriteFile).not.toHaveBeenCalled()
  })

  it('should report write failures with the system error text', async () => {
    vi.mocked(atomicWriteFile).mockRejectedValueOnce(new Error('Permission denied'))

    const failure = runExport({
      source: sourceOf(ACCOUNTS),
      settings: { uuid: SEED, folder: '' },
      outputPath: '/readonly/bw.json',
      format: 'json',
      now: NOW
    })

    await expect(failure).rejects.toBeInstanceOf(ExportError)
    await expect(failure).rejects.toMatchObject({ code: ExportErrorCode.WRITE_FAILED, message: 'Permission denied' })
  })
})
