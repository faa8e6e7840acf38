import type { DeclaredMapping } from '@shared/schemas/accounts.schema'

/**
 * An account as the exporter sees it. Owned by the account source and never
 * modified by the exporter.
 */
export interface Account {
  /** Human-readable account name. */
  readonly name: string
  /** Class name used to identify the account in error messages. */
  readonly className: string
  /** Declared export mapping; absent when the account is not exported. */
  readonly exportSpec?: DeclaredMapping
  /**
   * Expands embedded placeholders in `text` against this account's data.
   * @throws ExpansionError if a placeholder cannot be resolved.
   */
  expand(text: string): string
}

/** Enumerates the accounts to export. */
export interface AccountSource {
  load(): Promise<Account[]>
}
