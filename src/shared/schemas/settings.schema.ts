import { z } from 'zod'

export const DEFAULT_FOLDER_TEMPLATE = '[Avendesora-]YYMMDD'

/** Persisted export settings. */
export const SettingsSchema = z.object({
  /** Identity seed every folder and item identifier is derived from. */
  uuid: z.string().uuid(),
  /** dayjs format template for the folder name; empty disables the folder. */
  folder: z.string().default(DEFAULT_FOLDER_TEMPLATE)
})

export type Settings = z.infer<typeof SettingsSchema>
