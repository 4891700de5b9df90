import { describe, expect, it } from 'vitest'

import { createStudentSchema } from '@/lib/validation/catalog'
import { createClassSessionSchema } from '@/lib/validation/class-session'
import { pageRequestSchema } from '@/lib/validation/common'

describe('createClassSessionSchema', () => {
  it('normalizes the day and coerces capacity', () => {
    const result = createClassSessionSchema.safeParse({
      courseId: 'CRS1',
      lecturerId: 'LECT5001',
      day: ' friday ',
      startTime: '14:00',
      endTime: '15:00',
      location: ' Lab 3 ',
      maxCapacity: '25',
    })

    expect(result.success && result.data).toEqual({
      courseId: 'CRS1',
      lecturerId: 'LECT5001',
      day: 'FRIDAY',
      startTime: '14:00',
      endTime: '15:00',
      location: 'Lab 3',
      maxCapacity: 25,
    })
  })

  it('reports each invalid field', () => {
    const result = createClassSessionSchema.safeParse({
      courseId: 'CRS1',
      lecturerId: 'LECT5001',
      day: 'someday',
      startTime: '2pm',
      endTime: '15:00',
      location: 'Lab 3',
      maxCapacity: 0,
    })

    expect(result.success ? null : result.error.flatten().fieldErrors).toEqual({
      day: ['Choose a day from MONDAY to SUNDAY.'],
      startTime: ['Start time must use the HH:mm format.'],
      maxCapacity: ['Capacity must be at least 1.'],
    })
  })

  it('caps capacity at the room limit', () => {
    const result = createClassSessionSchema.safeParse({
      courseId: 'CRS1',
      lecturerId: 'LECT5001',
      day: 'MONDAY',
      startTime: '09:00',
      endTime: '10:30',
      location: 'Hall',
      maxCapacity: 501,
    })

    expect(result.success ? null : result.error.flatten().fieldErrors).toEqual({
      maxCapacity: ['Capacity must be at most 500.'],
    })
  })
})

describe('pageRequestSchema', () => {
  it('fills in paging defaults', () => {
    const result = pageRequestSchema.safeParse({ sortBy: '  ' })

    expect(result.success && result.data).toEqual({ page: 0, size: 20, sortBy: undefined })
  })
})

describe('createStudentSchema', () => {
  it('requires a phone number', () => {
    const result = createStudentSchema.safeParse({ name: 'Ada Lovelace', departmentId: 'DEP1', enrollmentYear: '2021' })

    expect(result.success ? null : result.error.flatten().fieldErrors).toEqual({ phone: ['Phone is required.'] })
  })
})
