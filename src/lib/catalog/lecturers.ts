import type { Course, Lecturer, Page, PageRequest } from '@/types/scheduling'
import { getConfig } from '@/lib/env'
import { lockKey, type SchedulingStore } from '@/lib/store/types'
import { AssignmentConflictError, InvalidArgsError, NotFoundError } from '@/lib/scheduling/errors'
import { requireEntity } from '@/lib/scheduling/lookups'

import { generateLecturerEmail } from './contact'

export interface CreateLecturerInput {
  name: string
  phone: string
  departmentId: string
}

export type UpdateLecturerInput = Partial<Pick<CreateLecturerInput, 'name' | 'phone'>>

export interface CatalogOptions {
  emailDomain?: string
}

export async function createLecturer(
  store: SchedulingStore,
  input: CreateLecturerInput,
  options: CatalogOptions = {}
): Promise<Lecturer> {
  const emailDomain = options.emailDomain ?? getConfig().CAMPUS_EMAIL_DOMAIN

  const lecturer = await store.transaction(
    { locks: [lockKey('department', input.departmentId)], label: 'createLecturer' },
    async (tx) => {
      const department = await requireEntity(tx.departments, 'department', input.departmentId)
      const email = generateLecturerEmail(input.name, emailDomain)

      if ((await tx.lecturers.count({ email })) > 0) {
        throw new InvalidArgsError(`Email ${email} is already in use`, 'name')
      }

      return tx.lecturers.save({
        id: await tx.nextExternalId('lecturer'),
        name: input.name.trim(),
        email,
        phone: input.phone.trim(),
        departmentId: department.id,
      })
    }
  )

  console.log('[catalog] lecturer created', { id: lecturer.id, departmentId: lecturer.departmentId })
  return lecturer
}

export async function getLecturer(store: SchedulingStore, lecturerId: string) {
  return store.transaction({ locks: [], label: 'getLecturer' }, (tx) =>
    requireEntity(tx.lecturers, 'lecturer', lecturerId)
  )
}

export async function getLecturerByName(store: SchedulingStore, name: string) {
  const lecturer = await store.transaction({ locks: [], label: 'getLecturerByName' }, (tx) =>
    tx.lecturers.findByName(name)
  )

  if (!lecturer) {
    throw new NotFoundError('lecturer', name, `Lecturer with name: ${name} not found`)
  }

  return lecturer
}

export async function listLecturers(
  store: SchedulingStore,
  request: PageRequest,
  departmentId?: string
): Promise<Page<Lecturer>> {
  return store.transaction({ locks: [], label: 'listLecturers' }, async (tx) => {
    if (departmentId === undefined) {
      return tx.lecturers.list(request)
    }

    await requireEntity(tx.departments, 'department', departmentId)
    return tx.lecturers.list({ ...request, sortBy: request.sortBy ?? 'name' }, { departmentId })
  })
}

export async function countLecturers(store: SchedulingStore) {
  return store.transaction({ locks: [], label: 'countLecturers' }, (tx) => tx.lecturers.count())
}

export async function updateLecturer(
  store: SchedulingStore,
  lecturerId: string,
  input: UpdateLecturerInput
): Promise<Lecturer> {
  return store.transaction({ locks: [lockKey('lecturer', lecturerId)], label: 'updateLecturer' }, async (tx) => {
    const lecturer = await requireEntity(tx.lecturers, 'lecturer', lecturerId)

    return tx.lecturers.save({
      ...lecturer,
      name: input.name?.trim() ?? lecturer.name,
      phone: input.phone?.trim() ?? lecturer.phone,
    })
  })
}

export async function assignLecturerToCourse(store: SchedulingStore, lecturerId: string, courseId: string) {
  await store.transaction(
    { locks: [lockKey('lecturer', lecturerId), lockKey('course', courseId)], label: 'assignLecturerToCourse' },
    async (tx) => {
      const lecturer = await requireEntity(tx.lecturers, 'lecturer', lecturerId)
      const course = await requireEntity(tx.courses, 'course', courseId)
      const assignment = { lecturerId: lecturer.id, courseId: course.id }

      if (await tx.assignments.exists(assignment)) {
        throw new AssignmentConflictError(lecturer.id, course.id, 'Lecturer is already assigned to this course')
      }

      await tx.assignments.add(assignment)
    }
  )

  console.log('[catalog] lecturer assigned to course', { lecturerId, courseId })
}

export async function unassignLecturerFromCourse(store: SchedulingStore, lecturerId: string, courseId: string) {
  await store.transaction(
    { locks: [lockKey('lecturer', lecturerId), lockKey('course', courseId)], label: 'unassignLecturerFromCourse' },
    async (tx) => {
      const lecturer = await requireEntity(tx.lecturers, 'lecturer', lecturerId)
      const course = await requireEntity(tx.courses, 'course', courseId)
      const assignment = { lecturerId: lecturer.id, courseId: course.id }

      if (!(await tx.assignments.exists(assignment))) {
        throw new AssignmentConflictError(lecturer.id, course.id, 'Lecturer is not assigned to this course')
      }

      const teaching = await tx.classSessions.count({ lecturerId: lecturer.id, courseId: course.id })

      if (teaching > 0) {
        throw new AssignmentConflictError(
          lecturer.id,
          course.id,
          'Lecturer still teaches class sessions of this course'
        )
      }

      await tx.assignments.remove(assignment)
    }
  )

  console.log('[catalog] lecturer unassigned from course', { lecturerId, courseId })
}

export async function listCoursesOfLecturer(store: SchedulingStore, lecturerId: string): Promise<Course[]> {
  return store.transaction({ locks: [], label: 'listCoursesOfLecturer' }, async (tx) => {
    const lecturer = await requireEntity(tx.lecturers, 'lecturer', lecturerId)
    const assignments = await tx.assignments.findAll({ lecturerId: lecturer.id })

    if (assignments.length === 0) {
      return []
    }

    return tx.courses.findAll({ ids: assignments.map((assignment) => assignment.courseId) })
  })
}
