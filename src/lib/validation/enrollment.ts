import { z } from 'zod'

import { idField } from './common'

export const enrollmentSchema = z.object({
  studentId: idField('Student'),
  classSessionId: idField('Class session'),
})

export type EnrollmentPayload = z.infer<typeof enrollmentSchema>
