import type {
  ClassSession,
  ClassSessionView,
  DayOfWeek,
  Page,
  PageRequest,
  TimeSlot,
} from '@/types/scheduling'
import { lockKey, type SchedulingStore, type StoreTransaction } from '@/lib/store/types'

import { availableSeats, ensureValidCapacity, isFull } from './capacity'
import {
  AssignmentConflictError,
  CapacityConflictError,
  ConcurrencyConflictError,
  ScheduleConflictError,
} from './errors'
import { requireEntity, rosterOf, toClassSessionView } from './lookups'
import { createTimeSlot, findOverlapping, formatTimeSlot, overlaps, sameTimeSlot } from './time-slot'

export interface CreateClassSessionInput {
  courseId: string
  lecturerId: string
  startTime: string
  endTime: string
  day: string
  location: string
  maxCapacity: number
}

export interface ClassSessionPatch {
  startTime?: string
  endTime?: string
  day?: string
  location?: string
  maxCapacity?: number
}

const MAX_SCOPE_ATTEMPTS = 3

export async function createClassSession(
  store: SchedulingStore,
  input: CreateClassSessionInput
): Promise<ClassSessionView> {
  console.log('[scheduling] creating class session', { courseId: input.courseId, lecturerId: input.lecturerId })

  const view = await store.transaction(
    {
      locks: [lockKey('course', input.courseId), lockKey('lecturer', input.lecturerId)],
      label: 'createClassSession',
    },
    async (tx) => {
      const course = await requireEntity(tx.courses, 'course', input.courseId)
      const lecturer = await requireEntity(tx.lecturers, 'lecturer', input.lecturerId)

      const assigned = await tx.assignments.exists({ lecturerId: lecturer.id, courseId: course.id })

      if (!assigned) {
        throw new AssignmentConflictError(lecturer.id, course.id, 'Lecturer is not assigned to this course')
      }

      const timeSlot = createTimeSlot(input.day, input.startTime, input.endTime)
      ensureValidCapacity(input.maxCapacity)

      const lecturerSessions = await tx.classSessions.findAll({ lecturerId: lecturer.id })

      if (findOverlapping(timeSlot, lecturerSessions).length > 0) {
        throw new ScheduleConflictError('lecturer', lecturer.id, 'Lecturer has scheduling conflict')
      }

      const session = await tx.classSessions.save({
        id: await tx.nextExternalId('classSession'),
        courseId: course.id,
        lecturerId: lecturer.id,
        timeSlot,
        location: input.location.trim(),
        maxCapacity: input.maxCapacity,
      })

      return toClassSessionView(tx, session, [])
    }
  )

  console.log('[scheduling] class session created', { id: view.id })
  return view
}

interface SessionScope {
  session: ClassSession
  studentIds: string[]
}

async function readSessionScope(tx: StoreTransaction, sessionId: string): Promise<SessionScope> {
  const session = await requireEntity(tx.classSessions, 'classSession', sessionId)
  return { session, studentIds: await rosterOf(tx, sessionId) }
}

/**
 * Runs `work` holding the session, its lecturer and every enrolled student.
 * The roster is read once to learn which students to lock and again under
 * the locks; if it grew in between, the attempt is repeated.
 */
async function runInSessionScope<T>(
  store: SchedulingStore,
  sessionId: string,
  label: string,
  work: (tx: StoreTransaction, scope: SessionScope) => Promise<T>
): Promise<T> {
  for (let attempt = 1; attempt <= MAX_SCOPE_ATTEMPTS; attempt += 1) {
    const planned = await store.transaction({ locks: [], label: `${label}:plan` }, (tx) =>
      readSessionScope(tx, sessionId)
    )

    const locks = [
      lockKey('classSession', sessionId),
      lockKey('lecturer', planned.session.lecturerId),
      ...planned.studentIds.map((studentId) => lockKey('student', studentId)),
    ]

    const outcome = await store.transaction({ locks, label }, async (tx) => {
      const current = await readSessionScope(tx, sessionId)
      const covered =
        current.session.lecturerId === planned.session.lecturerId &&
        current.studentIds.every((studentId) => planned.studentIds.includes(studentId))

      if (!covered) {
        return { done: false as const }
      }

      return { done: true as const, value: await work(tx, current) }
    })

    if (outcome.done) {
      return outcome.value
    }

    console.warn('[scheduling] session scope changed while locking, retrying', { sessionId, label, attempt })
  }

  throw new ConcurrencyConflictError(MAX_SCOPE_ATTEMPTS)
}

function mergeTimeSlot(current: TimeSlot, patch: ClassSessionPatch): TimeSlot | null {
  if (patch.startTime === undefined && patch.endTime === undefined && patch.day === undefined) {
    return null
  }

  return createTimeSlot(
    patch.day ?? current.day,
    patch.startTime ?? current.startTime,
    patch.endTime ?? current.endTime
  )
}

/**
 * Fails when moving the session to `candidate` would double-book any enrolled
 * student. Cost is O(enrolled students × sessions per student): every student's
 * other sessions are loaded and compared, which is fine at seminar-room scale.
 */
async function ensureNoStudentConflicts(
  tx: StoreTransaction,
  session: ClassSession,
  studentIds: string[],
  candidate: TimeSlot
) {
  for (const studentId of studentIds) {
    const enrollments = await tx.enrollments.findAll({ studentId })
    const otherSessionIds = enrollments
      .map((enrollment) => enrollment.classSessionId)
      .filter((classSessionId) => classSessionId !== session.id)

    if (otherSessionIds.length === 0) {
      continue
    }

    const otherSessions = await tx.classSessions.findAll({ ids: otherSessionIds })

    if (otherSessions.some((other) => overlaps(other.timeSlot, candidate))) {
      throw new ScheduleConflictError(
        'classSession',
        session.id,
        'Time slot change creates conflicts for enrolled students'
      )
    }
  }
}

async function ensureNoLecturerConflict(tx: StoreTransaction, session: ClassSession, candidate: TimeSlot) {
  const lecturerSessions = await tx.classSessions.findAll({ lecturerId: session.lecturerId })
  const clashes = findOverlapping(
    candidate,
    lecturerSessions.filter((other) => other.id !== session.id)
  )

  if (clashes.length > 0) {
    throw new ScheduleConflictError('lecturer', session.lecturerId, 'Lecturer has scheduling conflict')
  }
}

export async function updateClassSession(
  store: SchedulingStore,
  sessionId: string,
  patch: ClassSessionPatch
): Promise<ClassSessionView> {
  console.log('[scheduling] updating class session', { sessionId })

  const view = await runInSessionScope(store, sessionId, 'updateClassSession', async (tx, { session, studentIds }) => {
    const candidate = mergeTimeSlot(session.timeSlot, patch)
    const slotChanged = candidate !== null && !sameTimeSlot(candidate, session.timeSlot)

    if (candidate && slotChanged) {
      await ensureNoStudentConflicts(tx, session, studentIds, candidate)
      await ensureNoLecturerConflict(tx, session, candidate)
    }

    if (patch.maxCapacity !== undefined) {
      ensureValidCapacity(patch.maxCapacity)

      if (patch.maxCapacity < studentIds.length) {
        throw new CapacityConflictError(
          session.id,
          session.maxCapacity,
          `Cannot reduce capacity of ${session.id} to ${patch.maxCapacity}: ${studentIds.length} students are enrolled`
        )
      }
    }

    const updated = await tx.classSessions.save({
      ...session,
      timeSlot: candidate ?? session.timeSlot,
      location: patch.location !== undefined ? patch.location.trim() : session.location,
      maxCapacity: patch.maxCapacity ?? session.maxCapacity,
    })

    if (slotChanged && candidate) {
      console.log('[scheduling] class session moved', {
        sessionId,
        from: formatTimeSlot(session.timeSlot),
        to: formatTimeSlot(candidate),
      })
    }

    return toClassSessionView(tx, updated, studentIds)
  })

  console.log('[scheduling] class session updated', { sessionId })
  return view
}

export async function getClassSession(store: SchedulingStore, sessionId: string): Promise<ClassSessionView> {
  return store.transaction({ locks: [], label: 'getClassSession' }, async (tx) => {
    const session = await requireEntity(tx.classSessions, 'classSession', sessionId)
    return toClassSessionView(tx, session)
  })
}

export type ClassSessionListScope =
  | { kind: 'all' }
  | { kind: 'course'; courseId: string }
  | { kind: 'lecturer'; lecturerId: string }
  | { kind: 'student'; studentId: string }
  | { kind: 'day'; day: DayOfWeek }

async function pageForScope(
  tx: StoreTransaction,
  request: PageRequest,
  scope: ClassSessionListScope
): Promise<Page<ClassSession>> {
  switch (scope.kind) {
    case 'all':
      return tx.classSessions.list(request)
    case 'course':
      await requireEntity(tx.courses, 'course', scope.courseId)
      return tx.classSessions.list(request, { courseId: scope.courseId })
    case 'lecturer':
      await requireEntity(tx.lecturers, 'lecturer', scope.lecturerId)
      return tx.classSessions.list(request, { lecturerId: scope.lecturerId })
    case 'student': {
      await requireEntity(tx.students, 'student', scope.studentId)
      const enrollments = await tx.enrollments.findAll({ studentId: scope.studentId })
      return tx.classSessions.list(request, {
        ids: enrollments.map((enrollment) => enrollment.classSessionId),
      })
    }
    case 'day':
      return tx.classSessions.list(request, { day: scope.day })
  }
}

export async function listClassSessions(
  store: SchedulingStore,
  request: PageRequest,
  scope: ClassSessionListScope = { kind: 'all' }
): Promise<Page<ClassSessionView>> {
  return store.transaction({ locks: [], label: 'listClassSessions' }, async (tx) => {
    // Scoped listings read in time order unless the caller asks otherwise.
    const sortedRequest = scope.kind === 'all' ? request : { ...request, sortBy: request.sortBy ?? 'startTime' }
    const page = await pageForScope(tx, sortedRequest, scope)
    const items = await Promise.all(page.items.map((session) => toClassSessionView(tx, session)))
    return { ...page, items }
  })
}

export async function countClassSessions(store: SchedulingStore): Promise<number> {
  return store.transaction({ locks: [], label: 'countClassSessions' }, (tx) => tx.classSessions.count())
}

async function readSeats(store: SchedulingStore, sessionId: string) {
  return store.transaction({ locks: [], label: 'readSeats' }, async (tx) => {
    const session = await requireEntity(tx.classSessions, 'classSession', sessionId)
    const enrolledCount = await tx.enrollments.count({ classSessionId: session.id })
    return { maxCapacity: session.maxCapacity, enrolledCount }
  })
}

export async function getAvailableSeats(store: SchedulingStore, sessionId: string): Promise<number> {
  return availableSeats(await readSeats(store, sessionId))
}

export async function hasAvailableSeats(store: SchedulingStore, sessionId: string): Promise<boolean> {
  return !isFull(await readSeats(store, sessionId))
}
