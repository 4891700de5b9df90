import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { initialActionState, type ActionContext } from '@/actions/action-state'
import { assignLecturerAction, createCourseAction, deleteStudentAction } from '@/actions/catalog'
import { createClassSessionAction, listClassSessionsAction, updateClassSessionAction } from '@/actions/class-sessions'
import { enrollStudentAction } from '@/actions/enrollment'
import type { Actor } from '@/lib/authz'
import type { SchedulingStore } from '@/lib/store/types'

import { seedCampus } from './helpers/campus'

type Campus = Awaited<ReturnType<typeof seedCampus>>

const admin: Actor = { id: 'staff-1', role: 'admin' }

let campus: Campus

function contextFor(actor: Actor | null): ActionContext {
  return { store: campus.store, actor }
}

const validSession = {
  courseId: 'CRS1',
  lecturerId: 'LECT5001',
  day: 'monday',
  startTime: '09:00',
  endTime: '10:30',
  location: 'Room A',
  maxCapacity: '2',
}

beforeEach(async () => {
  campus = await seedCampus()
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('authorization', () => {
  it('starts idle', () => {
    expect(initialActionState).toEqual({ status: 'idle' })
  })

  it('requires a signed-in actor', async () => {
    const state = await listClassSessionsAction(contextFor(null), {})

    expect(state).toEqual({
      status: 'error',
      code: 'FORBIDDEN',
      message: 'Sign in to view class sessions.',
      fieldErrors: undefined,
    })
  })

  it('keeps schedule changes for administrators', async () => {
    const state = await createClassSessionAction(contextFor({ id: '15001', role: 'student' }), validSession)

    expect(state.code).toBe('FORBIDDEN')
    expect(state.message).toBe('You are not allowed to create class sessions.')
  })

  it('lets students enroll only themselves', async () => {
    await createClassSessionAction(contextFor(admin), validSession)

    const other = await enrollStudentAction(contextFor({ id: '15002', role: 'student' }), {
      studentId: '15001',
      classSessionId: 'CL101',
    })
    expect(other.message).toBe('Students can only enroll themselves.')

    const self = await enrollStudentAction(contextFor({ id: '15001', role: 'student' }), {
      studentId: '15001',
      classSessionId: 'CL101',
    })
    expect(self.status).toBe('success')
    expect(self.message).toBe('Ada Lovelace enrolled in Algorithms. 1 seat(s) left.')
    expect(self.data?.availableSeats).toBe(1)
  })
})

describe('input handling', () => {
  it('returns field errors for invalid input', async () => {
    const state = await createClassSessionAction(contextFor(admin), { ...validSession, courseId: '  ' })

    expect(state.status).toBe('error')
    expect(state.code).toBe('VALIDATION_FAILED')
    expect(state.fieldErrors).toEqual({ courseId: ['Course is required.'] })
  })

  it('requires at least one change on update', async () => {
    const state = await updateClassSessionAction(contextFor(admin), { classSessionId: 'CL101' })

    expect(state.fieldErrors).toEqual({ classSessionId: ['Provide at least one field to change.'] })
  })

  it('creates a session from form values', async () => {
    const state = await createClassSessionAction(contextFor(admin), validSession)

    expect(state.status).toBe('success')
    expect(state.message).toBe('Class session CL101 created.')
    expect(state.data?.timeSlot).toEqual({ day: 'MONDAY', startTime: '09:00', endTime: '10:30' })
    expect(state.data?.maxCapacity).toBe(2)
  })

  it('normalizes course codes', async () => {
    const state = await createCourseAction(contextFor(admin), { name: 'Compilers', code: 'cs301', departmentId: 'DEP1' })

    expect(state.data).toEqual({ id: 'CRS3', name: 'Compilers', code: 'CS301', departmentId: 'DEP1' })
  })
})

describe('error translation', () => {
  it('carries the scheduling error code and message', async () => {
    const state = await assignLecturerAction(contextFor(admin), { lecturerId: 'LECT5001', courseId: 'CRS1' })

    expect(state).toEqual({
      status: 'error',
      code: 'ASSIGNMENT_CONFLICT',
      message: 'Lecturer is already assigned to this course',
      fieldErrors: undefined,
    })
  })

  it('reports a successful delete', async () => {
    const state = await deleteStudentAction(contextFor(admin), { id: '15003' })

    expect(state).toEqual({ status: 'success', message: 'Student 15003 deleted.', data: '15003' })
  })

  it('hides unexpected failures behind a generic message', async () => {
    const failure = new Error('connection reset')
    const brokenStore: SchedulingStore = {
      transaction: async () => {
        throw failure
      },
    }
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined)

    const state = await enrollStudentAction(
      { store: brokenStore, actor: admin },
      { studentId: '15001', classSessionId: 'CL101' }
    )

    expect(state.code).toBe('UNEXPECTED')
    expect(state.message).toBe('Something went wrong while processing the request.')
    expect(errorSpy).toHaveBeenCalledWith('[actions] enrollStudentAction failed', failure)
  })
})
