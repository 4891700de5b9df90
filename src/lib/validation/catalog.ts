import { z } from 'zod'

import { idField, nameField, phoneField } from './common'

const codeField = z
  .string({ required_error: 'Code is required.' })
  .trim()
  .min(2, 'Code must be at least 2 characters.')
  .max(16, 'Code must be at most 16 characters.')
  .transform((value) => value.toUpperCase())

export const createDepartmentSchema = z.object({
  name: nameField('Department name'),
  code: codeField,
})

export const updateDepartmentSchema = createDepartmentSchema.partial().extend({
  departmentId: idField('Department'),
})

export const createCourseSchema = z.object({
  name: nameField('Course name'),
  code: codeField,
  departmentId: idField('Department'),
})

export const updateCourseSchema = createCourseSchema.omit({ departmentId: true }).partial().extend({
  courseId: idField('Course'),
})

export const createLecturerSchema = z.object({
  name: nameField('Lecturer name'),
  phone: phoneField,
  departmentId: idField('Department'),
})

export const updateLecturerSchema = createLecturerSchema.omit({ departmentId: true }).partial().extend({
  lecturerId: idField('Lecturer'),
})

export const createStudentSchema = z.object({
  name: nameField('Student name'),
  phone: phoneField,
  departmentId: idField('Department'),
  enrollmentYear: z.coerce
    .number({ invalid_type_error: 'Enrollment year must be a number.' })
    .int('Enrollment year must be a whole number.'),
})

export const updateStudentSchema = createStudentSchema
  .omit({ departmentId: true, enrollmentYear: true })
  .partial()
  .extend({
    studentId: idField('Student'),
  })

export const courseAssignmentSchema = z.object({
  lecturerId: idField('Lecturer'),
  courseId: idField('Course'),
})

export const entityIdSchema = z.object({
  id: idField('ID'),
})

export type CreateDepartmentPayload = z.infer<typeof createDepartmentSchema>
export type CreateCoursePayload = z.infer<typeof createCourseSchema>
export type CreateLecturerPayload = z.infer<typeof createLecturerSchema>
export type CreateStudentPayload = z.infer<typeof createStudentSchema>
