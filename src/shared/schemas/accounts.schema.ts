import { z } from 'zod'

/** A raw value in a declared export mapping. */
export type DeclaredValue = string | DeclaredValue[] | { [key: string]: DeclaredValue }

/** Field name to raw value, in declaration order. */
export type DeclaredMapping = Record<string, DeclaredValue>

const ARRAY_INDEX = /^(?:0|[1-9]\d*)$/
const MAX_ARRAY_INDEX = 2 ** 32 - 2

/** True for keys that objects enumerate first, in numeric order, whatever order they were written in. */
function isArrayIndexKey(key: string): boolean {
  return ARRAY_INDEX.test(key) && Number(key) <= MAX_ARRAY_INDEX
}

function rejectArrayIndexKeys(mapping: Record<string, unknown>, ctx: z.RefinementCtx): void {
  for (const key of Object.keys(mapping)) {
    if (isArrayIndexKey(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: `numeric key "${key}" cannot keep its declared order; rename it (for example "#${key}").`
      })
    }
  }
}

export const DeclaredValueSchema: z.ZodType<DeclaredValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.array(DeclaredValueSchema),
    z.record(z.string(), DeclaredValueSchema).superRefine(rejectArrayIndexKeys)
  ])
)

export const DeclaredMappingSchema = z.record(z.string(), DeclaredValueSchema).superRefine(rejectArrayIndexKeys)

/** A stored account attribute: scalars, lists and keyed groups of them. */
export type AccountFieldValue =
  | string
  | number
  | boolean
  | AccountFieldValue[]
  | { [key: string]: AccountFieldValue }

export const AccountFieldValueSchema: z.ZodType<AccountFieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.array(AccountFieldValueSchema),
    z.record(z.string(), AccountFieldValueSchema)
  ])
)

export const AccountEntrySchema = z.object({
  name: z.string().min(1),
  class: z.string().min(1).optional(),
  fields: z.record(z.string(), AccountFieldValueSchema).default({}),
  bitwarden: DeclaredMappingSchema.optional()
})

export type AccountEntry = z.infer<typeof AccountEntrySchema>

export const AccountsFileSchema = z.object({
  accounts: z.array(AccountEntrySchema).default([])
})
