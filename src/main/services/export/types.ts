/**
 * Type definitions shared by the record assembly pipeline.
 */

import type { VaultFolder } from '@shared/schemas/vault-document.schema'

/** A value placed into an assembled record. */
export type OutputValue = string | number | OutputValue[] | OutputObject

/** A nested mapping inside an assembled record. */
export interface OutputObject {
  [key: string]: OutputValue
}

/**
 * One assembled vault item. Top-level keys include `id`, `folderId`, `type`,
 * `name`, the type section (`login`, `secureNote`, `card` or `identity`),
 * and optionally `fields` and `notes`.
 */
export type OutputRecord = OutputObject

/** Root of the generated import file. */
export interface VaultDocument {
  items: OutputRecord[]
  folders?: VaultFolder[]
}

/** Names of the structured-field transforms. */
export type ExtractorId = 'uris' | 'fields' | 'expiration' | 'names' | 'street'

/** One segment of an output path: a literal key, or a transform producing the final key. */
export type PathStep =
  | { kind: 'literal'; key: string }
  | { kind: 'extractor'; extractor: ExtractorId }

/**
 * What an extractor produces. A `null` key merges `value` (a mapping) into the
 * object addressed by the preceding path steps.
 */
export interface ExtractorResult {
  key: string | null
  value: OutputValue
}

/** Identifiers applied to every record when a folder is active. */
export interface FolderContext {
  id: string
  name: string
}
