import { ExportError, ExportErrorCode } from './errors'
import type { ExtractorId, PathStep } from './types'

/** Static description of one supported Bitwarden item type. */
export interface EntryTypeDescriptor {
  /** Numeric `type` written on the item. */
  readonly typeId: 1 | 2 | 3 | 4
  /** Key of the type-specific section on the item. */
  readonly section: string
  /** Canonical field name to output path. */
  readonly fields: Readonly<Record<string, readonly PathStep[]>>
  /** Legacy field name to canonical field name. */
  readonly aliases: Readonly<Record<string, string>>
}

const at = (...keys: string[]): PathStep[] => keys.map((key) => ({ kind: 'literal', key }))

const extract = (extractor: ExtractorId, ...prefix: string[]): PathStep[] => [
  ...at(...prefix),
  { kind: 'extractor', extractor }
]

const COMMON_FIELDS = {
  name: at('name'),
  fields: extract('fields'),
  notes: at('notes')
}

export const ENTRY_TYPES: Readonly<Record<string, EntryTypeDescriptor>> = {
  login: {
    typeId: 1,
    section: 'login',
    fields: {
      ...COMMON_FIELDS,
      username: at('login', 'username'),
      password: at('login', 'password'),
      totp: at('login', 'totp'),
      urls: extract('uris', 'login')
    },
    aliases: {
      login_username: 'username',
      login_password: 'password',
      login_totp: 'totp',
      login_uri: 'urls'
    }
  },
  note: {
    typeId: 2,
    section: 'secureNote',
    fields: { ...COMMON_FIELDS },
    aliases: {}
  },
  card: {
    typeId: 3,
    section: 'card',
    fields: {
      ...COMMON_FIELDS,
      holder: at('card', 'cardholderName'),
      brand: at('card', 'brand'),
      ccn: at('card', 'number'),
      exp: extract('expiration', 'card'),
      cvv: at('card', 'code')
    },
    aliases: {}
  },
  identity: {
    typeId: 4,
    section: 'identity',
    fields: {
      ...COMMON_FIELDS,
      title: at('identity', 'title'),
      names: extract('names', 'identity'),
      street: extract('street', 'identity'),
      city: at('identity', 'city'),
      state: at('identity', 'state'),
      zip: at('identity', 'postalCode'),
      country: at('identity', 'country'),
      company: at('identity', 'company'),
      email: at('identity', 'email'),
      phone: at('identity', 'phone'),
      ssn: at('identity', 'ssn'),
      username: at('identity', 'username'),
      passport: at('identity', 'passportNumber'),
      license: at('identity', 'licenseNumber')
    },
    aliases: {}
  }
}

/**
 * Looks up the descriptor for a declared type name.
 *
 * @param account - Account class name, for the error message.
 * @throws ExportError UNKNOWN_TYPE if the name is not one of the supported types.
 */
export function lookupEntryType(account: string, typeName: unknown): EntryTypeDescriptor {
  if (typeof typeName === 'string' && Object.hasOwn(ENTRY_TYPES, typeName)) {
    return ENTRY_TYPES[typeName]
  }
  const shown = typeof typeName === 'string' ? typeName : JSON.stringify(typeName)
  throw new ExportError(
    ExportErrorCode.UNKNOWN_TYPE,
    `unknown type "${shown}", expected one of: ${Object.keys(ENTRY_TYPES).join(', ')}.`,
    { account, field: 'type' }
  )
}

/**
 * Maps a declared field name (canonical or legacy) to its output path.
 *
 * @throws ExportError UNKNOWN_FIELD if the name is not in the type's field table.
 */
export function resolveFieldTarget(
  account: string,
  descriptor: EntryTypeDescriptor,
  field: string
): readonly PathStep[] {
  const canonical = Object.hasOwn(descriptor.aliases, field) ? descriptor.aliases[field] : field
  if (!Object.hasOwn(descriptor.fields, canonical)) {
    throw new ExportError(ExportErrorCode.UNKNOWN_FIELD, 'unknown field.', { account, field })
  }
  return descriptor.fields[canonical]
}
