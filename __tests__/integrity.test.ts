import { beforeEach, describe, expect, it } from 'vitest'

import { createDepartment, getDepartment } from '@/lib/catalog/departments'
import { createCourse, getCourse } from '@/lib/catalog/courses'
import { createLecturer, getLecturer, listCoursesOfLecturer } from '@/lib/catalog/lecturers'
import { getStudent } from '@/lib/catalog/students'
import { getClassSession } from '@/lib/scheduling/class-sessions'
import { enrollStudent } from '@/lib/scheduling/enrollment'
import { DeleteConflictError, NotFoundError } from '@/lib/scheduling/errors'
import {
  deleteClassSession,
  deleteCourse,
  deleteDepartment,
  deleteLecturer,
  deleteStudent,
} from '@/lib/scheduling/integrity'

import { EMAIL_DOMAIN, openSession, rejectionOf, seedCampus } from './helpers/campus'

type Campus = Awaited<ReturnType<typeof seedCampus>>

let campus: Campus

beforeEach(async () => {
  campus = await seedCampus()
})

describe('deleteDepartment', () => {
  it('refuses while students belong to it', async () => {
    const error = await rejectionOf(deleteDepartment(campus.store, campus.department.id), DeleteConflictError)
    expect(error.message).toBe('Cannot delete department with students')
    expect(error.code).toBe('DELETE_CONFLICT')
  })

  it('refuses while lecturers belong to it', async () => {
    const mathematics = await createDepartment(campus.store, { name: 'Mathematics', code: 'MATH' })
    await createLecturer(
      campus.store,
      { name: 'Emmy Noether', phone: '555-0400', departmentId: mathematics.id },
      { emailDomain: EMAIL_DOMAIN }
    )

    const error = await rejectionOf(deleteDepartment(campus.store, mathematics.id), DeleteConflictError)
    expect(error.message).toBe('Cannot delete department with lecturers')
  })

  it('refuses while courses belong to it', async () => {
    const mathematics = await createDepartment(campus.store, { name: 'Mathematics', code: 'MATH' })
    await createCourse(campus.store, { name: 'Topology', code: 'MA101', departmentId: mathematics.id })

    const error = await rejectionOf(deleteDepartment(campus.store, mathematics.id), DeleteConflictError)
    expect(error.message).toBe('Cannot delete department with courses')
    expect((await getDepartment(campus.store, mathematics.id)).name).toBe('Mathematics')
  })

  it('removes an empty department', async () => {
    const empty = await createDepartment(campus.store, { name: 'Mathematics', code: 'MATH' })

    await deleteDepartment(campus.store, empty.id)

    await rejectionOf(getDepartment(campus.store, empty.id), NotFoundError)
  })
})

describe('deleteCourse', () => {
  it('refuses while any session exists, even an empty one', async () => {
    await openSession(campus.store, { courseId: campus.algorithms.id, lecturerId: campus.hopper.id })

    const error = await rejectionOf(deleteCourse(campus.store, campus.algorithms.id), DeleteConflictError)
    expect(error.message).toBe('Cannot delete course Algorithms because class sessions are assigned to it')
  })

  it('drops the course and its lecturer assignments', async () => {
    await deleteCourse(campus.store, campus.databases.id)

    expect(await listCoursesOfLecturer(campus.store, campus.liskov.id)).toEqual([])
    const error = await rejectionOf(getCourse(campus.store, campus.databases.id), NotFoundError)
    expect(error.message).toBe('Course with ID: CRS2 not found')
  })
})

describe('deleteLecturer', () => {
  it('refuses while the lecturer teaches a session', async () => {
    await openSession(campus.store, { courseId: campus.algorithms.id, lecturerId: campus.hopper.id })

    const error = await rejectionOf(deleteLecturer(campus.store, campus.hopper.id), DeleteConflictError)
    expect(error.message).toBe('Cannot delete lecturer Grace Hopper because they are assigned to class sessions')
  })

  it('removes a lecturer without sessions', async () => {
    await deleteLecturer(campus.store, campus.liskov.id)

    const error = await rejectionOf(getLecturer(campus.store, campus.liskov.id), NotFoundError)
    expect(error.message).toBe('Lecturer with ID: LECT5002 not found')
  })
})

describe('deleteClassSession', () => {
  it('refuses while students are enrolled', async () => {
    const session = await openSession(campus.store, { courseId: campus.algorithms.id, lecturerId: campus.hopper.id })
    await enrollStudent(campus.store, campus.ada.id, session.id)

    const error = await rejectionOf(deleteClassSession(campus.store, session.id), DeleteConflictError)
    expect(error.message).toBe('Cannot delete class with ID: CL101 because students are enrolled in the class')
  })

  it('removes an empty session', async () => {
    const session = await openSession(campus.store, { courseId: campus.algorithms.id, lecturerId: campus.hopper.id })

    await deleteClassSession(campus.store, session.id)

    await rejectionOf(getClassSession(campus.store, session.id), NotFoundError)
  })
})

describe('deleteStudent', () => {
  it('clears enrollments so the session can be deleted afterwards', async () => {
    const session = await openSession(campus.store, { courseId: campus.algorithms.id, lecturerId: campus.hopper.id })
    await enrollStudent(campus.store, campus.ada.id, session.id)

    await deleteStudent(campus.store, campus.ada.id)

    await rejectionOf(getStudent(campus.store, campus.ada.id), NotFoundError)
    expect((await getClassSession(campus.store, session.id)).enrolledCount).toBe(0)
    await deleteClassSession(campus.store, session.id)
  })

  it('reports an unknown student', async () => {
    const error = await rejectionOf(deleteStudent(campus.store, '99999'), NotFoundError)
    expect(error.message).toBe('Student with ID: 99999 not found')
  })
})
