/**
 * Bitwarden CSV serializer.
 *
 * The CSV import format only knows login and secure-note items; card and
 * identity items have no columns to go in.
 */

import { ExportError, ExportErrorCode } from './errors'
import type { OutputObject, OutputValue, VaultDocument } from './types'

export const CSV_COLUMNS = [
  'folder',
  'favorite',
  'type',
  'name',
  'notes',
  'fields',
  'reprompt',
  'login_uri',
  'login_username',
  'login_password',
  'login_totp'
] as const

type CsvColumn = (typeof CSV_COLUMNS)[number]

const CSV_TYPES: Record<number, string> = { 1: 'login', 2: 'note' }

function asObject(value: OutputValue | undefined): OutputObject {
  return typeof value === 'object' && !Array.isArray(value) ? value : {}
}

function asList(value: OutputValue | undefined): OutputValue[] {
  return Array.isArray(value) ? value : []
}

function text(value: OutputValue | undefined): string {
  return typeof value === 'string' || typeof value === 'number' ? String(value) : ''
}

/** Wraps a value in quotes if it contains a comma, quote or line break. */
function escapeValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

function toRow(item: OutputObject, folder: string): Record<CsvColumn, string> {
  const typeName = CSV_TYPES[Number(item['type'])]
  if (!typeName) {
    throw new ExportError(
      ExportErrorCode.UNSUPPORTED_IN_CSV,
      'only login and note items can be exported as CSV.',
      { account: text(item['name']) }
    )
  }

  const login = asObject(item['login'])
  const fields = asList(item['fields'])
    .map(asObject)
    .map((field) => `${text(field['name'])}: ${text(field['value'])}`)
  const uris = asList(login['uris']).map((uri) => text(asObject(uri)['uri']))

  return {
    folder,
    favorite: '',
    type: typeName,
    name: text(item['name']),
    notes: text(item['notes']),
    fields: fields.join('\n'),
    reprompt: '0',
    login_uri: uris.join(','),
    login_username: text(login['username']),
    login_password: text(login['password']),
    login_totp: text(login['totp'])
  }
}

/**
 * Serializes an assembled vault document as Bitwarden CSV, header row first.
 *
 * @throws ExportError UNSUPPORTED_IN_CSV for card and identity items.
 */
export function toBitwardenCsv(document: VaultDocument): string {
  const folder = document.folders?.[0]?.name ?? ''
  const lines: string[] = [CSV_COLUMNS.join(',')]

  for (const item of document.items) {
    const row = toRow(item, folder)
    lines.push(CSV_COLUMNS.map((column) => escapeValue(row[column])).join(','))
  }

  return `${lines.join('\n')}\n`
}
