import { z } from 'zod'

import { DAYS_OF_WEEK, type DayOfWeek } from '@/types/scheduling'
import { MAX_SESSION_CAPACITY, MIN_SESSION_CAPACITY } from '@/lib/scheduling/capacity'

import { idField } from './common'

const timeField = (label: string) =>
  z
    .string({ required_error: `${label} is required.` })
    .trim()
    .regex(/^\d{1,2}:\d{2}(:00)?$/, `${label} must use the HH:mm format.`)

const dayField = z
  .string({ required_error: 'Day is required.' })
  .trim()
  .transform((value) => value.toUpperCase())
  .refine((value): value is DayOfWeek => DAYS_OF_WEEK.some((day) => day === value), {
    message: 'Choose a day from MONDAY to SUNDAY.',
  })

const locationField = z
  .string({ required_error: 'Location is required.' })
  .trim()
  .min(1, 'Location is required.')
  .max(120, 'Location must be at most 120 characters.')

const capacityField = z.coerce
  .number({ invalid_type_error: 'Capacity must be a number.' })
  .int('Capacity must be a whole number.')
  .min(MIN_SESSION_CAPACITY, `Capacity must be at least ${MIN_SESSION_CAPACITY}.`)
  .max(MAX_SESSION_CAPACITY, `Capacity must be at most ${MAX_SESSION_CAPACITY}.`)

export const createClassSessionSchema = z.object({
  courseId: idField('Course'),
  lecturerId: idField('Lecturer'),
  day: dayField,
  startTime: timeField('Start time'),
  endTime: timeField('End time'),
  location: locationField,
  maxCapacity: capacityField,
})

export const updateClassSessionSchema = z
  .object({
    classSessionId: idField('Class session'),
    day: dayField.optional(),
    startTime: timeField('Start time').optional(),
    endTime: timeField('End time').optional(),
    location: locationField.optional(),
    maxCapacity: capacityField.optional(),
  })
  .refine(
    (value) =>
      value.day !== undefined ||
      value.startTime !== undefined ||
      value.endTime !== undefined ||
      value.location !== undefined ||
      value.maxCapacity !== undefined,
    { message: 'Provide at least one field to change.', path: ['classSessionId'] }
  )

export const classSessionIdSchema = z.object({
  classSessionId: idField('Class session'),
})

export type CreateClassSessionPayload = z.infer<typeof createClassSessionSchema>
export type UpdateClassSessionPayload = z.infer<typeof updateClassSessionSchema>
