import { describe, expect, it } from 'vitest'

import {
  countClassSessions,
  getClassSession,
  listClassSessions,
  updateClassSession,
} from '@/lib/scheduling/class-sessions'
import { enrollStudent } from '@/lib/scheduling/enrollment'
import {
  CapacityConflictError,
  EnrollmentConflictError,
  ScheduleConflictError,
  SchedulingError,
} from '@/lib/scheduling/errors'
import { overlaps } from '@/lib/scheduling/time-slot'
import { KeyedMutex } from '@/lib/store/keyed-mutex'
import { InMemorySchedulingStore } from '@/lib/store/memory'
import { lockKey } from '@/lib/store/types'

import { openSession, seedCampus } from './helpers/campus'

describe('KeyedMutex', () => {
  it('runs holders of the same key one after another', async () => {
    const mutex = new KeyedMutex()
    const order: string[] = []

    const releaseFirst = await mutex.acquire(['student:15001'])
    const second = mutex.acquire(['student:15001']).then((release) => {
      order.push('second')
      release()
    })

    await Promise.resolve()
    order.push('first')
    expect(mutex.isLocked('student:15001')).toBe(true)

    releaseFirst()
    await second

    expect(order).toEqual(['first', 'second'])
    expect(mutex.isLocked('student:15001')).toBe(false)
  })

  it('does not block disjoint keys', async () => {
    const mutex = new KeyedMutex()
    const releaseStudent = await mutex.acquire(['student:15001'])

    const releaseSession = await mutex.acquire(['classSession:CL101'])

    expect(mutex.isLocked('student:15001')).toBe(true)
    releaseSession()
    releaseStudent()
    expect(mutex.isLocked('classSession:CL101')).toBe(false)
  })
})

describe('InMemorySchedulingStore transactions', () => {
  it('discards staged writes when the work fails', async () => {
    const store = new InMemorySchedulingStore()

    await expect(
      store.transaction({ locks: [lockKey('department', 'DEP1')] }, async (tx) => {
        await tx.departments.save({ id: 'DEP1', name: 'Physics', code: 'PHY' })
        throw new Error('abort')
      })
    ).rejects.toThrow('abort')

    const stored = await store.transaction({ locks: [] }, (tx) => tx.departments.findById('DEP1'))
    expect(stored).toBeNull()
  })

  it('does not expose staged writes to reads in the same transaction', async () => {
    const store = new InMemorySchedulingStore()

    const seenDuringWork = await store.transaction({ locks: [] }, async (tx) => {
      await tx.departments.save({ id: 'DEP1', name: 'Physics', code: 'PHY' })
      return tx.departments.count()
    })

    expect(seenDuringWork).toBe(0)
    expect(await store.transaction({ locks: [] }, (tx) => tx.departments.count())).toBe(1)
  })
})

describe('concurrent enrollment', () => {
  it('admits exactly one of two overlapping sessions for the same student', async () => {
    const campus = await seedCampus()
    const algorithms = await openSession(campus.store, {
      courseId: campus.algorithms.id,
      lecturerId: campus.hopper.id,
    })
    const databases = await openSession(campus.store, {
      courseId: campus.databases.id,
      lecturerId: campus.liskov.id,
      startTime: '10:00',
      endTime: '11:00',
    })

    const results = await Promise.allSettled([
      enrollStudent(campus.store, campus.ada.id, algorithms.id),
      enrollStudent(campus.store, campus.ada.id, databases.id),
    ])

    const fulfilled = results.filter((result) => result.status === 'fulfilled')
    const rejected = results.filter((result) => result.status === 'rejected')
    expect(fulfilled).toHaveLength(1)
    expect(rejected).toHaveLength(1)
    expect(rejected[0]).toMatchObject({ reason: expect.any(EnrollmentConflictError) })
  })

  it('hands the last seat to exactly one student', async () => {
    const campus = await seedCampus()
    const session = await openSession(campus.store, {
      courseId: campus.algorithms.id,
      lecturerId: campus.hopper.id,
      maxCapacity: 1,
    })

    const results = await Promise.allSettled([
      enrollStudent(campus.store, campus.ada.id, session.id),
      enrollStudent(campus.store, campus.alan.id, session.id),
      enrollStudent(campus.store, campus.edsger.id, session.id),
    ])

    const rejected = results.filter((result) => result.status === 'rejected')
    expect(rejected).toHaveLength(2)
    rejected.forEach((result) => expect(result).toMatchObject({ reason: expect.any(CapacityConflictError) }))

    const stored = await getClassSession(campus.store, session.id)
    expect(stored.enrolledCount).toBe(1)
    expect(stored.availableSeats).toBe(0)
  })
})

describe('concurrent scheduling', () => {
  it('books only one of two overlapping sessions for the same lecturer', async () => {
    const campus = await seedCampus()

    const results = await Promise.allSettled([
      openSession(campus.store, { courseId: campus.algorithms.id, lecturerId: campus.hopper.id }),
      openSession(campus.store, {
        courseId: campus.algorithms.id,
        lecturerId: campus.hopper.id,
        startTime: '10:00',
        endTime: '11:00',
        location: 'Room B',
      }),
    ])

    const rejected = results.filter((result) => result.status === 'rejected')
    expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1)
    expect(rejected).toHaveLength(1)
    expect(rejected[0]).toMatchObject({ reason: expect.any(ScheduleConflictError) })
    expect(await countClassSessions(campus.store)).toBe(1)
  })

  it('never double-books a student when a move races an enrollment', async () => {
    const campus = await seedCampus()
    const monday = await openSession(campus.store, {
      courseId: campus.algorithms.id,
      lecturerId: campus.hopper.id,
    })
    const tuesday = await openSession(campus.store, {
      courseId: campus.databases.id,
      lecturerId: campus.liskov.id,
      day: 'TUESDAY',
    })
    await enrollStudent(campus.store, campus.ada.id, tuesday.id)

    const results = await Promise.allSettled([
      updateClassSession(campus.store, tuesday.id, { day: 'MONDAY' }),
      enrollStudent(campus.store, campus.ada.id, monday.id),
    ])

    const rejected = results.filter((result) => result.status === 'rejected')
    expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1)
    expect(rejected).toHaveLength(1)
    expect(rejected[0]).toMatchObject({ reason: expect.any(SchedulingError) })

    const schedule = await listClassSessions(
      campus.store,
      { page: 0, size: 20 },
      { kind: 'student', studentId: campus.ada.id }
    )
    const slots = schedule.items.map((session) => session.timeSlot)
    const clashes = slots.filter((slot, index) => slots.slice(index + 1).some((other) => overlaps(slot, other)))
    expect(clashes).toEqual([])
  })
})
