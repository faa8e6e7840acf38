import { createHash } from 'crypto'

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

function uuidToBytes(uuid: string): Buffer {
  if (!UUID_PATTERN.test(uuid)) {
    throw new Error(`Invalid UUID: "${uuid}"`)
  }
  return Buffer.from(uuid.replace(/-/g, ''), 'hex')
}

/**
 * Name-based (version 5, SHA-1) UUID of `name` within `namespace`, as in RFC 4122 §4.3.
 *
 * @example
 * ```ts
 * deriveUuid('6ba7b810-9dad-11d1-80b4-00c04fd430c8', 'example.com')
 * // -> 'cfbff0d1-9375-5685-968c-48ce8b15ae17'
 * ```
 */
export function deriveUuid(namespace: string, name: string): string {
  const hash = createHash('sha1')
    .update(uuidToBytes(namespace))
    .update(Buffer.from(name, 'utf-8'))
    .digest()
    .subarray(0, 16)

  hash[6] = (hash[6] & 0x0f) | 0x50
  hash[8] = (hash[8] & 0x3f) | 0x80

  const hex = hash.toString('hex')
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join('-')
}

/** Folder identifier, derived from the persisted seed and the rendered folder name. */
export function deriveFolderId(seed: string, folderName: string): string {
  return deriveUuid(seed, folderName)
}

/** Item identifier, derived from the folder identifier and the declared item name. */
export function deriveRecordId(folderId: string, recordName: string): string {
  return deriveUuid(folderId, recordName)
}
