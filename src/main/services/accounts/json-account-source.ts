/**
 * Account source backed by a JSON accounts file.
 *
 * File layout:
 * ```json
 * {
 *   "accounts": [
 *     {
 *       "name": "bank",
 *       "class": "BankOfAmerica",
 *       "fields": { "username": "jdoe", "passcode": "test-secret" },
 *       "bitwarden": { "name": "Bank", "type": "login", "password": "{passcode}" }
 *     }
 *   ]
 * }
 * ```
 */

import type { AccountEntry, AccountFieldValue, DeclaredMapping } from '@shared/schemas/accounts.schema'
import { AccountsFileSchema } from '@shared/schemas/accounts.schema'
import { LogRing } from '../diagnostics/log-ring'
import { ExportError, ExportErrorCode, errorMessage } from '../export/errors'
import { atomicReadFile } from '../platform/atomic-fs'
import { expandPlaceholders } from './expander'
import type { Account, AccountSource } from './types'

const logger = LogRing.getInstance()

class StoredAccount implements Account {
  readonly name: string
  readonly className: string
  readonly exportSpec?: DeclaredMapping
  private readonly fields: Record<string, AccountFieldValue>

  constructor(entry: AccountEntry) {
    this.name = entry.name
    this.className = entry.class ?? entry.name
    this.exportSpec = entry.bitwarden
    this.fields = entry.fields
  }

  expand(text: string): string {
    return expandPlaceholders(text, this.fields)
  }
}

/** Builds accounts from already-parsed file content. */
export function accountsFromJson(content: unknown, origin = 'accounts'): Account[] {
  const result = AccountsFileSchema.safeParse(content)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new ExportError(ExportErrorCode.ACCOUNTS_INVALID, `${origin} failed validation:\n${issues.join('\n')}`)
  }
  return result.data.accounts.map((entry) => new StoredAccount(entry))
}

export class JsonAccountSource implements AccountSource {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Account[]> {
    let parsed: unknown
    try {
      parsed = JSON.parse(await atomicReadFile(this.filePath))
    } catch (err) {
      logger.error('Failed to read accounts file', { path: this.filePath, error: errorMessage(err) })
      throw new ExportError(ExportErrorCode.ACCOUNTS_INVALID, errorMessage(err), {}, err)
    }

    const accounts = accountsFromJson(parsed, this.filePath)
    logger.info('Accounts loaded', { path: this.filePath, count: accounts.length })
    return accounts
  }
}
