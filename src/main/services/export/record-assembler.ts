import type { DeclaredMapping } from '@shared/schemas/accounts.schema'
import type { Account } from '../accounts/types'
import { lookupEntryType, resolveFieldTarget } from './entry-types'
import { ExportError, ExportErrorCode, errorMessage } from './errors'
import { applyExtractor } from './extractors'
import { deriveRecordId } from './identifiers'
import { RecordBuilder } from './record-builder'
import { resolveValue } from './value-resolver'
import type { FolderContext, OutputRecord, OutputValue, PathStep } from './types'

/**
 * Builds one vault item from an account's declared mapping.
 *
 * @param folder - Active folder, or `null` when items get no identifiers.
 * @throws ExportError tagged with the account class name and, where known, the field.
 */
export function assembleRecord(
  account: Account,
  declared: DeclaredMapping,
  folder: FolderContext | null
): OutputRecord {
  const culprit = account.className
  const builder = new RecordBuilder()

  if (!Object.hasOwn(declared, 'name')) {
    throw new ExportError(ExportErrorCode.NAME_MISSING, 'name missing.', { account: culprit })
  }
  const name = declared['name']
  if (typeof name !== 'string') {
    throw new ExportError(ExportErrorCode.INVALID_VALUE, 'name must be a string.', {
      account: culprit,
      field: 'name'
    })
  }
  if (folder) {
    builder.write(['id'], deriveRecordId(folder.id, name))
    builder.write(['folderId'], folder.id)
  }

  if (!Object.hasOwn(declared, 'type')) {
    throw new ExportError(ExportErrorCode.TYPE_MISSING, 'type missing.', { account: culprit })
  }
  const { type: typeName, ...fields } = declared
  const descriptor = lookupEntryType(culprit, typeName)
  builder.write(['type'], descriptor.typeId)
  builder.write([descriptor.section], {})

  for (const [field, raw] of Object.entries(fields)) {
    const steps = resolveFieldTarget(culprit, descriptor, field)
    const value = resolveValue(account, field, raw)
    try {
      placeValue(builder, steps, value)
    } catch (err) {
      if (err instanceof ExportError) {
        throw err.withCulprit({ account: culprit, field })
      }
      throw new ExportError(ExportErrorCode.INVALID_VALUE, errorMessage(err), { account: culprit, field }, err)
    }
  }

  return builder.build()
}

function placeValue(builder: RecordBuilder, steps: readonly PathStep[], value: OutputValue): void {
  const path: string[] = []

  for (const step of steps) {
    switch (step.kind) {
      case 'literal':
        path.push(step.key)
        break
      case 'extractor': {
        const extracted = applyExtractor(step.extractor, value)
        builder.write(extracted.key === null ? path : [...path, extracted.key], extracted.value)
        return
      }
    }
  }

  builder.write(path, value)
}
