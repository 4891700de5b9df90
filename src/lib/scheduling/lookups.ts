import type { ClassSession, ClassSessionView } from '@/types/scheduling'
import type { StoreTransaction } from '@/lib/store/types'

import { availableSeats, isFull } from './capacity'
import { NotFoundError, type EntityKind } from './errors'

interface FindById<T> {
  findById(id: string): Promise<T | null>
}

export async function requireEntity<T>(repository: FindById<T>, kind: EntityKind, id: string): Promise<T> {
  const entity = await repository.findById(id)

  if (!entity) {
    throw new NotFoundError(kind, id)
  }

  return entity
}

export async function rosterOf(tx: StoreTransaction, classSessionId: string): Promise<string[]> {
  const enrollments = await tx.enrollments.findAll({ classSessionId })
  return enrollments.map((enrollment) => enrollment.studentId).sort()
}

export async function sessionsOfStudent(tx: StoreTransaction, studentId: string): Promise<ClassSession[]> {
  const enrollments = await tx.enrollments.findAll({ studentId })

  if (enrollments.length === 0) {
    return []
  }

  return tx.classSessions.findAll({ ids: enrollments.map((enrollment) => enrollment.classSessionId) })
}

export async function toClassSessionView(
  tx: StoreTransaction,
  session: ClassSession,
  studentIds?: string[]
): Promise<ClassSessionView> {
  const [course, lecturer, roster] = await Promise.all([
    tx.courses.findById(session.courseId),
    tx.lecturers.findById(session.lecturerId),
    studentIds ? Promise.resolve(studentIds) : rosterOf(tx, session.id),
  ])
  const seats = { maxCapacity: session.maxCapacity, enrolledCount: roster.length }

  return {
    ...session,
    courseName: course?.name ?? 'Unknown Course',
    lecturerName: lecturer?.name ?? 'Unknown Lecturer',
    enrolledCount: roster.length,
    availableSeats: availableSeats(seats),
    isFull: isFull(seats),
    studentIds: roster,
  }
}
