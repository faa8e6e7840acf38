import { ExportError, ExportErrorCode } from './errors'
import { parseFieldList } from './field-list-parser'
import type { ExtractorId, ExtractorResult, OutputObject, OutputValue } from './types'

/** URI match rule written on every exported URI. */
export const DEFAULT_URI_MATCH = 2

type Extractor = (value: OutputValue) => ExtractorResult

function isMapping(value: OutputValue): value is OutputObject {
  return typeof value === 'object' && !Array.isArray(value)
}

function requireString(value: OutputValue, what: string): string {
  if (typeof value !== 'string') {
    throw new ExportError(ExportErrorCode.INVALID_VALUE, `${what} must be a string.`)
  }
  return value
}

function uriList(value: OutputValue): string[] {
  if (typeof value === 'string') {
    return value.split(/\s+/).filter(Boolean)
  }
  if (typeof value === 'number') {
    return [String(value)]
  }
  const items = Array.isArray(value) ? value : Object.values(value)
  return items.map((item) => requireString(item, 'each URL'))
}

function extractUris(value: OutputValue): ExtractorResult {
  return {
    key: 'uris',
    value: uriList(value).map((uri) => ({ uri, match: DEFAULT_URI_MATCH }))
  }
}

function extractCustomFields(value: OutputValue): ExtractorResult {
  let pairs: Array<[string, string]>

  if (typeof value === 'string') {
    pairs = parseFieldList(value)
  } else if (isMapping(value)) {
    pairs = Object.entries(value).map(([name, v]) => [name, requireString(v, `custom field "${name}"`)])
  } else {
    throw new ExportError(
      ExportErrorCode.INVALID_FIELD_LIST,
      'expected a mapping or a block of "key: value" lines.'
    )
  }

  return { key: 'fields', value: pairs.map(([name, v]) => ({ name, value: v })) }
}

const INTEGER = /^[+-]?\d+$/

function extractExpiration(value: OutputValue): ExtractorResult {
  const text = requireString(value, 'expiration date')
  const at = text.indexOf('/')
  const month = at >= 0 ? text.slice(0, at).trim() : ''
  const year = at >= 0 ? text.slice(at + 1).trim() : ''

  if (!INTEGER.test(month) || !INTEGER.test(year)) {
    throw new ExportError(
      ExportErrorCode.INVALID_EXPIRATION,
      `expected an expiration date of the form MM/YY, found "${text}".`
    )
  }

  let yearNumber = parseInt(year, 10)
  if (yearNumber < 100) {
    yearNumber += 2000
  }

  return {
    key: null,
    value: { expMonth: String(parseInt(month, 10)), expYear: String(yearNumber) }
  }
}

function extractNames(value: OutputValue): ExtractorResult {
  const tokens = requireString(value, 'names').split(/\s+/).filter(Boolean)
  const names: OutputObject = {}

  if (tokens.length === 1) {
    names['firstName'] = tokens[0]
  } else if (tokens.length >= 2) {
    names['firstName'] = tokens[0]
    if (tokens.length > 2) {
      names['middleName'] = tokens.slice(1, -1).join(' ')
    }
    names['lastName'] = tokens[tokens.length - 1]
  }

  return { key: null, value: names }
}

function extractStreet(value: OutputValue): ExtractorResult {
  const lines = requireString(value, 'street')
    .trim()
    .split(/\r?\n/)
    .map((line) => line.trim())
  const address: OutputObject = { address1: lines[0] }

  if (lines.length >= 2) {
    address['address2'] = lines[1]
  }
  if (lines.length >= 3) {
    address['address3'] = lines.slice(2).join('\n')
  }

  return { key: null, value: address }
}

const EXTRACTORS: Record<ExtractorId, Extractor> = {
  uris: extractUris,
  fields: extractCustomFields,
  expiration: extractExpiration,
  names: extractNames,
  street: extractStreet
}

/**
 * Applies the named structured-field transform to a resolved value.
 *
 * @throws ExportError when the value does not have the shape the transform expects.
 */
export function applyExtractor(id: ExtractorId, value: OutputValue): ExtractorResult {
  return EXTRACTORS[id](value)
}
