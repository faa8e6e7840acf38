import type { DeclaredValue } from '@shared/schemas/accounts.schema'
import type { Account } from '../accounts/types'
import { ExportError, ExportErrorCode, errorMessage } from './errors'
import type { OutputValue } from './types'

/**
 * Expands every leaf string of a declared value against the account's data,
 * keeping the value's shape.
 *
 * @param field - Declared field name, for error messages.
 * @throws ExportError EXPANSION_FAILED wrapping the account source's error.
 */
export function resolveValue(account: Account, field: string, raw: DeclaredValue): OutputValue {
  if (typeof raw === 'string') {
    try {
      return account.expand(raw)
    } catch (err) {
      if (err instanceof ExportError) {
        throw err.withCulprit({ account: account.className, field })
      }
      throw new ExportError(
        ExportErrorCode.EXPANSION_FAILED,
        errorMessage(err),
        { account: account.className, field },
        err
      )
    }
  }

  if (Array.isArray(raw)) {
    return raw.map((item) => resolveValue(account, field, item))
  }

  const resolved: Record<string, OutputValue> = {}
  for (const [key, value] of Object.entries(raw)) {
    resolved[key] = resolveValue(account, field, value)
  }
  return resolved
}
