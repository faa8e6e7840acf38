/**
 * Error codes raised while turning accounts into a Bitwarden vault document.
 *
 * Code ranges:
 * - E-1xx: Declaration errors (missing or unknown names in a declared mapping)
 * - E-2xx: Value errors (a declared value could not be expanded or extracted)
 * - E-3xx: Storage errors (settings, accounts and output files)
 */
export enum ExportErrorCode {
  NAME_MISSING = 'E-101',
  TYPE_MISSING = 'E-102',
  UNKNOWN_TYPE = 'E-103',
  UNKNOWN_FIELD = 'E-104',

  INVALID_VALUE = 'E-201',
  INVALID_EXPIRATION = 'E-202',
  INVALID_FIELD_LIST = 'E-203',
  EXPANSION_FAILED = 'E-204',
  UNSUPPORTED_IN_CSV = 'E-205',

  SETTINGS_INVALID = 'E-301',
  ACCOUNTS_INVALID = 'E-302',
  WRITE_FAILED = 'E-303'
}

/** Where an error happened: the account class name and the declared field. */
export interface Culprit {
  account?: string
  field?: string
}

/**
 * Error raised for any problem that aborts an export run.
 *
 * The culprit is prefixed to the message, e.g. `BankOfAmerica, foo: unknown field.`
 */
export class ExportError extends Error {
  readonly code: ExportErrorCode
  readonly culprit: Culprit
  /** Message without the culprit prefix. */
  readonly detail: string

  constructor(code: ExportErrorCode, detail: string, culprit: Culprit = {}, cause?: unknown) {
    super(formatMessage(detail, culprit), cause === undefined ? undefined : { cause })
    this.name = 'ExportError'
    this.code = code
    this.culprit = culprit
    this.detail = detail
    Object.setPrototypeOf(this, ExportError.prototype)
  }

  /**
   * Returns a copy of this error with missing culprit parts filled in.
   * The original error is kept as the cause of the copy.
   */
  withCulprit(culprit: Culprit): ExportError {
    return new ExportError(
      this.code,
      this.detail,
      { account: this.culprit.account ?? culprit.account, field: this.culprit.field ?? culprit.field },
      this
    )
  }
}

/** Raised by an account source when a placeholder cannot be expanded. */
export class ExpansionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ExpansionError'
    Object.setPrototypeOf(this, ExpansionError.prototype)
  }
}

function formatMessage(detail: string, culprit: Culprit): string {
  const parts = [culprit.account, culprit.field].filter((p): p is string => !!p)
  return parts.length > 0 ? `${parts.join(', ')}: ${detail}` : detail
}

/** Renders any thrown value as a message, the way the services log failures. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
