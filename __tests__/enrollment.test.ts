import { beforeEach, describe, expect, it } from 'vitest'

import { getClassSession, hasAvailableSeats } from '@/lib/scheduling/class-sessions'
import { enrollStudent, listStudentsInClassSession, withdrawStudent } from '@/lib/scheduling/enrollment'
import { CapacityConflictError, EnrollmentConflictError, NotFoundError } from '@/lib/scheduling/errors'
import type { ClassSessionView } from '@/types/scheduling'

import { openSession, rejectionOf, seedCampus } from './helpers/campus'

type Campus = Awaited<ReturnType<typeof seedCampus>>

let campus: Campus
let morning: ClassSessionView
let overlapping: ClassSessionView

beforeEach(async () => {
  campus = await seedCampus()
  morning = await openSession(campus.store, {
    courseId: campus.algorithms.id,
    lecturerId: campus.hopper.id,
    maxCapacity: 2,
  })
  overlapping = await openSession(campus.store, {
    courseId: campus.databases.id,
    lecturerId: campus.liskov.id,
    startTime: '10:00',
    endTime: '11:00',
  })
})

describe('enrollStudent', () => {
  it('walks a session from open to full', async () => {
    const first = await enrollStudent(campus.store, campus.ada.id, morning.id)
    expect(first).toEqual({
      studentId: '15001',
      classSessionId: 'CL101',
      studentName: 'Ada Lovelace',
      courseName: 'Algorithms',
      availableSeats: 1,
    })

    const overlap = await rejectionOf(enrollStudent(campus.store, campus.ada.id, overlapping.id), EnrollmentConflictError)
    expect(overlap.message).toBe('Class session CL102 overlaps another class of student 15001')

    const duplicate = await rejectionOf(enrollStudent(campus.store, campus.ada.id, morning.id), EnrollmentConflictError)
    expect(duplicate.message).toBe('Student 15001 is already enrolled in class session CL101')

    const second = await enrollStudent(campus.store, campus.alan.id, morning.id)
    expect(second.availableSeats).toBe(0)
    expect(await hasAvailableSeats(campus.store, morning.id)).toBe(false)

    const full = await rejectionOf(enrollStudent(campus.store, campus.edsger.id, morning.id), CapacityConflictError)
    expect(full.message).toBe('Class session CL101 has reached its maximum capacity of 2')
    expect(full.code).toBe('CAPACITY_CONFLICT')

    const stored = await getClassSession(campus.store, morning.id)
    expect(stored.studentIds).toEqual(['15001', '15002'])
    expect(stored.isFull).toBe(true)
  })

  it('leaves the roster untouched when a rule fails', async () => {
    await enrollStudent(campus.store, campus.ada.id, morning.id)
    await rejectionOf(enrollStudent(campus.store, campus.ada.id, overlapping.id), EnrollmentConflictError)

    const stored = await getClassSession(campus.store, overlapping.id)
    expect(stored.enrolledCount).toBe(0)
  })

  it('reports unknown students and sessions', async () => {
    const student = await rejectionOf(enrollStudent(campus.store, '99999', morning.id), NotFoundError)
    expect(student.message).toBe('Student with ID: 99999 not found')

    const session = await rejectionOf(enrollStudent(campus.store, campus.ada.id, 'CL999'), NotFoundError)
    expect(session.message).toBe('Class session with ID: CL999 not found')
  })
})

describe('withdrawStudent', () => {
  it('frees a seat for the next student', async () => {
    await enrollStudent(campus.store, campus.ada.id, morning.id)
    await enrollStudent(campus.store, campus.alan.id, morning.id)

    const withdrawn = await withdrawStudent(campus.store, campus.ada.id, morning.id)
    expect(withdrawn.availableSeats).toBe(1)

    const replacement = await enrollStudent(campus.store, campus.edsger.id, morning.id)
    expect(replacement.availableSeats).toBe(0)
  })

  it('lets a withdrawn student take the overlapping session', async () => {
    await enrollStudent(campus.store, campus.ada.id, morning.id)
    await withdrawStudent(campus.store, campus.ada.id, morning.id)

    const result = await enrollStudent(campus.store, campus.ada.id, overlapping.id)
    expect(result.courseName).toBe('Databases')
  })

  it('rejects a student who is not enrolled', async () => {
    const error = await rejectionOf(withdrawStudent(campus.store, campus.ada.id, morning.id), EnrollmentConflictError)
    expect(error.message).toBe('Student 15001 is not enrolled in class session CL101')
  })
})

describe('listStudentsInClassSession', () => {
  it('pages the roster by name', async () => {
    await enrollStudent(campus.store, campus.alan.id, morning.id)
    await enrollStudent(campus.store, campus.ada.id, morning.id)

    const page = await listStudentsInClassSession(campus.store, morning.id, { page: 0, size: 10 })

    expect(page.items.map((student) => student.name)).toEqual(['Ada Lovelace', 'Alan Turing'])
    expect(page.totalItems).toBe(2)
    expect(page.totalPages).toBe(1)
  })
})
