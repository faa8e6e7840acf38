/**
 * Placeholder expansion for declared values.
 *
 * Syntax:
 *   {username}          - Value of the `username` field
 *   {accounts.checking} - Key `checking` of the `accounts` field
 *   {questions.0}       - First entry of the `questions` list
 *   {{ and }}           - Literal braces
 */

import type { AccountFieldValue } from '@shared/schemas/accounts.schema'
import { ExpansionError } from '../export/errors'

const TOKEN = /\{\{|\}\}|\{([^{}]*)\}/g

function lookup(fields: Record<string, AccountFieldValue>, reference: string): string {
  const [head, ...rest] = reference.split('.').map((part) => part.trim())

  if (!head || !Object.hasOwn(fields, head)) {
    throw new ExpansionError(`unknown field "${reference}" in placeholder.`)
  }

  let value: AccountFieldValue = fields[head]
  for (const key of rest) {
    if (Array.isArray(value) && /^\d+$/.test(key) && Number(key) < value.length) {
      value = value[Number(key)]
    } else if (typeof value === 'object' && !Array.isArray(value) && Object.hasOwn(value, key)) {
      value = value[key]
    } else {
      throw new ExpansionError(`unknown field "${reference}" in placeholder.`)
    }
  }

  if (typeof value === 'object') {
    throw new ExpansionError(`placeholder "${reference}" does not name a single value.`)
  }
  return String(value)
}

/**
 * Replaces every `{reference}` in `text` with the referenced account field.
 *
 * @throws ExpansionError for an unknown reference, a reference to a list or
 *   group, or an unmatched brace.
 */
export function expandPlaceholders(text: string, fields: Record<string, AccountFieldValue>): string {
  if (/[{}]/.test(text.replace(TOKEN, ''))) {
    throw new ExpansionError(`unmatched brace in "${text}".`)
  }

  return text.replace(TOKEN, (token: string, reference: string | undefined) => {
    if (token === '{{') return '{'
    if (token === '}}') return '}'
    return lookup(fields, reference ?? '')
  })
}
