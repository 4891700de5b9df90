import type { Page, PageRequest, Student } from '@/types/scheduling'
import { getConfig } from '@/lib/env'
import { lockKey, type SchedulingStore } from '@/lib/store/types'
import { InvalidArgsError, NotFoundError } from '@/lib/scheduling/errors'
import { requireEntity } from '@/lib/scheduling/lookups'

import { generateStudentEmail } from './contact'
import type { CatalogOptions } from './lecturers'

export const MIN_ENROLLMENT_YEAR = 2000

export interface CreateStudentInput {
  name: string
  phone: string
  departmentId: string
  enrollmentYear: number
}

export type UpdateStudentInput = Partial<Pick<CreateStudentInput, 'name' | 'phone'>>

export function ensureValidEnrollmentYear(year: number, now: Date = new Date()) {
  const currentYear = now.getFullYear()

  if (!Number.isInteger(year) || year < MIN_ENROLLMENT_YEAR || year > currentYear) {
    throw new InvalidArgsError(`Invalid enrollment year: ${year}`, 'enrollmentYear')
  }
}

export async function createStudent(
  store: SchedulingStore,
  input: CreateStudentInput,
  options: CatalogOptions = {}
): Promise<Student> {
  ensureValidEnrollmentYear(input.enrollmentYear)
  const emailDomain = options.emailDomain ?? getConfig().CAMPUS_EMAIL_DOMAIN

  const student = await store.transaction(
    { locks: [lockKey('department', input.departmentId)], label: 'createStudent' },
    async (tx) => {
      const department = await requireEntity(tx.departments, 'department', input.departmentId)
      const email = generateStudentEmail(input.name, input.enrollmentYear, emailDomain)

      if ((await tx.students.count({ email })) > 0) {
        throw new InvalidArgsError(`Email ${email} is already in use`, 'name')
      }

      return tx.students.save({
        id: await tx.nextExternalId('student'),
        name: input.name.trim(),
        email,
        phone: input.phone.trim(),
        departmentId: department.id,
        enrollmentYear: input.enrollmentYear,
      })
    }
  )

  console.log('[catalog] student created', { id: student.id, departmentId: student.departmentId })
  return student
}

export async function getStudent(store: SchedulingStore, studentId: string) {
  return store.transaction({ locks: [], label: 'getStudent' }, (tx) => requireEntity(tx.students, 'student', studentId))
}

export async function getStudentByName(store: SchedulingStore, name: string) {
  const student = await store.transaction({ locks: [], label: 'getStudentByName' }, (tx) =>
    tx.students.findByName(name)
  )

  if (!student) {
    throw new NotFoundError('student', name, `Student with name: ${name} not found`)
  }

  return student
}

export async function findStudentByNameContaining(store: SchedulingStore, fragment: string) {
  const student = await store.transaction({ locks: [], label: 'findStudentByNameContaining' }, (tx) =>
    tx.students.findByNameContaining(fragment)
  )

  if (!student) {
    throw new NotFoundError('student', fragment, `Student with name that contains sequence: ${fragment} not found`)
  }

  return student
}

export async function listStudents(
  store: SchedulingStore,
  request: PageRequest,
  departmentId?: string
): Promise<Page<Student>> {
  return store.transaction({ locks: [], label: 'listStudents' }, async (tx) => {
    if (departmentId === undefined) {
      return tx.students.list(request)
    }

    await requireEntity(tx.departments, 'department', departmentId)
    return tx.students.list({ ...request, sortBy: request.sortBy ?? 'name' }, { departmentId })
  })
}

export async function countStudents(store: SchedulingStore) {
  return store.transaction({ locks: [], label: 'countStudents' }, (tx) => tx.students.count())
}

export async function updateStudent(
  store: SchedulingStore,
  studentId: string,
  input: UpdateStudentInput
): Promise<Student> {
  return store.transaction({ locks: [lockKey('student', studentId)], label: 'updateStudent' }, async (tx) => {
    const student = await requireEntity(tx.students, 'student', studentId)

    return tx.students.save({
      ...student,
      name: input.name?.trim() ?? student.name,
      phone: input.phone?.trim() ?? student.phone,
    })
  })
}
