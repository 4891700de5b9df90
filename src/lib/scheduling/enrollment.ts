import type { EnrollmentResult, Page, PageRequest, Student } from '@/types/scheduling'
import { lockKey, type SchedulingStore } from '@/lib/store/types'

import { availableSeats, isFull } from './capacity'
import { CapacityConflictError, EnrollmentConflictError } from './errors'
import { requireEntity, sessionsOfStudent } from './lookups'
import { overlaps } from './time-slot'

/**
 * Adds a student to a session roster. The duplicate check runs before the
 * overlap check so a repeated request reports a duplicate rather than the
 * session overlapping itself.
 */
export async function enrollStudent(
  store: SchedulingStore,
  studentId: string,
  classSessionId: string
): Promise<EnrollmentResult> {
  console.log('[scheduling] enrolling student', { studentId, classSessionId })

  const result = await store.transaction(
    {
      locks: [lockKey('student', studentId), lockKey('classSession', classSessionId)],
      label: 'enrollStudent',
    },
    async (tx) => {
      const student = await requireEntity(tx.students, 'student', studentId)
      const session = await requireEntity(tx.classSessions, 'classSession', classSessionId)
      const enrolledCount = await tx.enrollments.count({ classSessionId: session.id })

      if (isFull({ maxCapacity: session.maxCapacity, enrolledCount })) {
        throw new CapacityConflictError(session.id, session.maxCapacity)
      }

      const alreadyEnrolled = await tx.enrollments.exists({ studentId: student.id, classSessionId: session.id })

      if (alreadyEnrolled) {
        throw new EnrollmentConflictError(
          student.id,
          session.id,
          `Student ${student.id} is already enrolled in class session ${session.id}`
        )
      }

      const currentSessions = await sessionsOfStudent(tx, student.id)

      if (currentSessions.some((existing) => overlaps(existing.timeSlot, session.timeSlot))) {
        throw new EnrollmentConflictError(
          student.id,
          session.id,
          `Class session ${session.id} overlaps another class of student ${student.id}`
        )
      }

      await tx.enrollments.add({ studentId: student.id, classSessionId: session.id })
      const course = await tx.courses.findById(session.courseId)

      return {
        studentId: student.id,
        classSessionId: session.id,
        studentName: student.name,
        courseName: course?.name ?? 'Unknown Course',
        availableSeats: availableSeats({ maxCapacity: session.maxCapacity, enrolledCount: enrolledCount + 1 }),
      }
    }
  )

  console.log('[scheduling] student enrolled', { studentId, classSessionId, availableSeats: result.availableSeats })
  return result
}

export async function withdrawStudent(
  store: SchedulingStore,
  studentId: string,
  classSessionId: string
): Promise<EnrollmentResult> {
  console.log('[scheduling] withdrawing student', { studentId, classSessionId })

  return store.transaction(
    {
      locks: [lockKey('student', studentId), lockKey('classSession', classSessionId)],
      label: 'withdrawStudent',
    },
    async (tx) => {
      const student = await requireEntity(tx.students, 'student', studentId)
      const session = await requireEntity(tx.classSessions, 'classSession', classSessionId)
      const enrollment = { studentId: student.id, classSessionId: session.id }

      if (!(await tx.enrollments.exists(enrollment))) {
        throw new EnrollmentConflictError(
          student.id,
          session.id,
          `Student ${student.id} is not enrolled in class session ${session.id}`
        )
      }

      const enrolledCount = await tx.enrollments.count({ classSessionId: session.id })
      await tx.enrollments.remove(enrollment)
      const course = await tx.courses.findById(session.courseId)

      return {
        studentId: student.id,
        classSessionId: session.id,
        studentName: student.name,
        courseName: course?.name ?? 'Unknown Course',
        availableSeats: availableSeats({ maxCapacity: session.maxCapacity, enrolledCount: enrolledCount - 1 }),
      }
    }
  )
}

export async function listStudentsInClassSession(
  store: SchedulingStore,
  classSessionId: string,
  request: PageRequest
): Promise<Page<Student>> {
  return store.transaction({ locks: [], label: 'listStudentsInClassSession' }, async (tx) => {
    const session = await requireEntity(tx.classSessions, 'classSession', classSessionId)
    const enrollments = await tx.enrollments.findAll({ classSessionId: session.id })

    return tx.students.list(
      { ...request, sortBy: request.sortBy ?? 'name' },
      { ids: enrollments.map((enrollment) => enrollment.studentId) }
    )
  })
}
