import { ExportError, ExportErrorCode } from './errors'

const SEPARATOR = ': '

/**
 * Parses a block of `key: value` lines into ordered name/value pairs.
 *
 * Blank lines and `#` comment lines are skipped. Everything after the first
 * `": "` is the value, so values may themselves contain colons. A line that
 * ends in `:` declares an empty value.
 *
 * @throws ExportError with code INVALID_FIELD_LIST on a malformed line or a repeated key.
 */
export function parseFieldList(block: string): Array<[string, string]> {
  const entries: Array<[string, string]> = []
  const seen = new Set<string>()

  block.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) return

    const lineNo = index + 1
    let key: string
    let value: string

    const at = trimmed.indexOf(SEPARATOR)
    if (at >= 0) {
      key = trimmed.slice(0, at).trim()
      value = trimmed.slice(at + SEPARATOR.length).trim()
    } else if (trimmed.endsWith(':')) {
      key = trimmed.slice(0, -1).trim()
      value = ''
    } else {
      throw new ExportError(
        ExportErrorCode.INVALID_FIELD_LIST,
        `line ${lineNo}: expected "key: value", found "${trimmed}".`
      )
    }

    if (!key) {
      throw new ExportError(ExportErrorCode.INVALID_FIELD_LIST, `line ${lineNo}: empty key.`)
    }
    if (seen.has(key)) {
      throw new ExportError(ExportErrorCode.INVALID_FIELD_LIST, `line ${lineNo}: duplicate key "${key}".`)
    }

    seen.add(key)
    entries.push([key, value])
  })

  return entries
}
