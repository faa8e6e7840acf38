import { z } from 'zod'

const CustomFieldSchema = z.object({
  name: z.string(),
  value: z.string()
})

const UriSchema = z.object({
  uri: z.string(),
  match: z.number().int()
})

const LoginSchema = z
  .object({
    username: z.string(),
    password: z.string(),
    totp: z.string(),
    uris: z.array(UriSchema)
  })
  .partial()
  .strict()

const CardSchema = z
  .object({
    cardholderName: z.string(),
    brand: z.string(),
    number: z.string(),
    expMonth: z.string(),
    expYear: z.string(),
    code: z.string()
  })
  .partial()
  .strict()

const IdentitySchema = z
  .object({
    title: z.string(),
    firstName: z.string(),
    middleName: z.string(),
    lastName: z.string(),
    address1: z.string(),
    address2: z.string(),
    address3: z.string(),
    city: z.string(),
    state: z.string(),
    postalCode: z.string(),
    country: z.string(),
    company: z.string(),
    email: z.string(),
    phone: z.string(),
    ssn: z.string(),
    username: z.string(),
    passportNumber: z.string(),
    licenseNumber: z.string()
  })
  .partial()
  .strict()

/** Shape check for an assembled item, as the Bitwarden JSON importer reads it. */
export const VaultItemSchema = z.object({
  id: z.string().uuid().optional(),
  folderId: z.string().uuid().optional(),
  type: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]),
  name: z.string(),
  notes: z.string().optional(),
  fields: z.array(CustomFieldSchema).optional(),
  login: LoginSchema.optional(),
  secureNote: z.object({}).strict().optional(),
  card: CardSchema.optional(),
  identity: IdentitySchema.optional()
})

export const VaultFolderSchema = z.object({
  id: z.string().uuid(),
  name: z.string().min(1)
})

export type VaultFolder = z.infer<typeof VaultFolderSchema>
