import { z } from 'zod'

export const idField = (label: string) =>
  z
    .string({ required_error: `${label} is required.` })
    .trim()
    .min(1, `${label} is required.`)

export const nameField = (label: string) =>
  z
    .string({ required_error: `${label} is required.` })
    .trim()
    .min(1, `${label} is required.`)
    .max(120, `${label} must be at most 120 characters.`)

export const phoneField = z
  .string({ required_error: 'Phone is required.' })
  .trim()
  .regex(/^[0-9+()\-\s]{6,20}$/, 'Enter a valid phone number.')

export const pageRequestSchema = z.object({
  page: z.coerce.number().int('Page must be a whole number.').min(0, 'Page number must be >= 0').default(0),
  size: z.coerce.number().int('Size must be a whole number.').positive('Page size must be > 0').default(20),
  sortBy: z
    .string()
    .optional()
    .transform((value) => {
      if (!value) {
        return undefined
      }

      const trimmed = value.trim()
      return trimmed.length > 0 ? trimmed : undefined
    }),
})

export type PageRequestInput = z.infer<typeof pageRequestSchema>
