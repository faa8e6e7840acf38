import { describe, it, expect } from 'vitest'
import { CSV_COLUMNS, toBitwardenCsv } from '../../../src/main/services/export/csv-exporter'
import { ExportErrorCode } from '../../../src/main/services/export/errors'

const HEADER = CSV_COLUMNS.join(',')

describe('toBitwardenCsv', () => {
  it('should write only the header for an empty vault', () => {
    expect(toBitwardenCsv({ items: [] })).toBe(`${HEADER}\n`)
  })

  it('should flatten a login with its folder, fields and URIs', () => {
    const csv = toBitwardenCsv({
      items: [
        {
          type: 1,
          login: {
            username: 'jdoe',
            password: 'test-secret',
            uris: [
              { uri: 'https://a.example.com', match: 2 },
              { uri: 'https://b.example.com', match: 2 }
            ]
          },
          name: 'Bank of Test',
          fields: [
            { name: 'pin', value: '1234' },
            { name: 'branch', value: 'Main' }
          ]
        }
      ],
      folders: [{ id: '8f07f1a0-2ac8-5bec-a61c-e6c13c523f3d', name: 'Avendesora-261019' }]
    })

    expect(csv.split('\n').slice(1).join('\n')).toBe(
      'Avendesora-261019,,login,Bank of Test,,"pin: 1234\nbranch: Main",0,"https://a.example.com,https://b.example.com",jdoe,test-secret,\n'
    )
  })

  it('should quote values containing quotes', () => {
    const csv = toBitwardenCsv({ items: [{ type: 2, secureNote: {}, name: 'Say "hi"', notes: 'plain' }] })

    expect(csv).toBe(`${HEADER}\n,,note,"Say ""hi""",plain,,0,,,,\n`)
  })

  it('should refuse card and identity items', () => {
    expect(() => toBitwardenCsv({ items: [{ type: 3, card: {}, name: 'Visa' }] })).toThrow(
      'Visa: only login and note items can be exported as CSV.'
    )
    try {
      toBitwardenCsv({ items: [{ type: 4, identity: {}, name: 'Me' }] })
    } catch (err) {
      expect(err).toMatchObject({ code: ExportErrorCode.UNSUPPORTED_IN_CSV })
    }
  })
})
