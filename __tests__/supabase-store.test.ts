import type { SupabaseClient } from '@supabase/supabase-js'
import { afterEach, describe, expect, it, vi } from 'vitest'

import { ConcurrencyConflictError, StoreError } from '@/lib/scheduling/errors'
import {
  SupabaseSchedulingStore,
  mapClassSessionRow,
  serializeChange,
  toClassSessionRow,
} from '@/lib/store/supabase'
import { lockKey, type StoreTransaction } from '@/lib/store/types'

import { rejectionOf } from './helpers/campus'

const sessionRow = {
  external_id: 'CL101',
  course_id: 'CRS1',
  lecturer_id: 'LECT5001',
  day_of_week: 1,
  start_time: '09:00:00',
  end_time: '10:30:00',
  location: 'Room A',
  max_capacity: 30,
}

type RpcResult = { data: unknown; error: { code: string; message: string } | null }

function makeClient(rpcResults: RpcResult[], versions: Array<{ external_id: string; version: number }>) {
  const query = {
    select: vi.fn(),
    in: vi.fn(),
    returns: vi.fn(() => Promise.resolve({ data: versions, error: null })),
  }
  query.select.mockReturnValue(query)
  query.in.mockReturnValue(query)
  const rpc = vi.fn()
  rpcResults.forEach((result) => rpc.mockResolvedValueOnce(result))

  const client = { from: vi.fn(() => query), rpc } as unknown as SupabaseClient
  return { client, rpc }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('row mapping', () => {
  it('maps class session rows to domain values and back', () => {
    const session = mapClassSessionRow(sessionRow)

    expect(session).toEqual({
      id: 'CL101',
      courseId: 'CRS1',
      lecturerId: 'LECT5001',
      timeSlot: { day: 'MONDAY', startTime: '09:00', endTime: '10:30' },
      location: 'Room A',
      maxCapacity: 30,
    })
    expect(toClassSessionRow(session)).toEqual(sessionRow)
  })

  it('rejects an out-of-range weekday', () => {
    expect(() => mapClassSessionRow({ ...sessionRow, day_of_week: 8 })).toThrow(StoreError)
  })

  it('serializes staged relation changes with column names', () => {
    expect(
      serializeChange({ kind: 'addEnrollment', relation: { studentId: '15001', classSessionId: 'CL101' } })
    ).toEqual({ kind: 'addEnrollment', record: { student_id: '15001', class_session_id: 'CL101' } })

    expect(serializeChange({ kind: 'delete', entity: 'course', id: 'CRS1' })).toEqual({
      kind: 'delete',
      entity: 'course',
      id: 'CRS1',
    })
  })
})

describe('SupabaseSchedulingStore.transaction', () => {
  const enroll = { studentId: '15001', classSessionId: 'CL101' }

  it('retries the work after a version conflict', async () => {
    const { client, rpc } = makeClient(
      [
        { data: null, error: { code: '40001', message: 'version conflict' } },
        { data: null, error: null },
      ],
      [{ external_id: '15001', version: 3 }]
    )
    const store = new SupabaseSchedulingStore(client, { retries: 2 })
    const work = vi.fn(async (tx: StoreTransaction) => {
      await tx.enrollments.add(enroll)
      return 'committed'
    })
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)

    const result = await store.transaction({ locks: [lockKey('student', '15001')], label: 'enroll' }, work)

    expect(result).toBe('committed')
    expect(work).toHaveBeenCalledTimes(2)
    expect(rpc).toHaveBeenCalledTimes(2)
    expect(rpc).toHaveBeenLastCalledWith('commit_scheduling_changes', {
      expected_versions: [{ entity: 'student', id: '15001', version: 3 }],
      changes: [{ kind: 'addEnrollment', record: { student_id: '15001', class_session_id: 'CL101' } }],
    })
  })

  it('gives up after the configured retries', async () => {
    const conflict = { data: null, error: { code: '40001', message: 'version conflict' } }
    const { client } = makeClient([conflict, conflict], [])
    const store = new SupabaseSchedulingStore(client, { retries: 1 })
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)

    const error = await rejectionOf(
      store.transaction({ locks: [] }, async (tx) => {
        await tx.enrollments.add(enroll)
      }),
      ConcurrencyConflictError
    )

    expect(error.attempts).toBe(2)
  })

  it('wraps other commit failures', async () => {
    const { client } = makeClient([{ data: null, error: { code: '23503', message: 'foreign key violation' } }], [])
    const store = new SupabaseSchedulingStore(client, { retries: 3 })
    vi.spyOn(console, 'error').mockImplementation(() => undefined)

    const error = await rejectionOf(
      store.transaction({ locks: [] }, async (tx) => {
        await tx.enrollments.remove(enroll)
      }),
      StoreError
    )

    expect(error.message).toBe('Failed to save changes')
    expect(error.code).toBe('STORE_FAILURE')
  })

  it('skips the commit when nothing was staged', async () => {
    const { client, rpc } = makeClient([], [])
    const store = new SupabaseSchedulingStore(client)

    expect(await store.transaction({ locks: [] }, async () => 42)).toBe(42)
    expect(rpc).not.toHaveBeenCalled()
  })
})

describe('filters', () => {
  it('counts students by email', async () => {
    const eq = vi.fn(() => Promise.resolve({ count: 1, error: null }))
    const select = vi.fn(() => ({ eq }))
    const from = vi.fn(() => ({ select }))
    const client = { from, rpc: vi.fn() } as unknown as SupabaseClient
    const store = new SupabaseSchedulingStore(client)

    const count = await store.transaction({ locks: [] }, (tx) =>
      tx.students.count({ email: 'aalovelace21@test.edu' })
    )

    expect(count).toBe(1)
    expect(from).toHaveBeenCalledWith('students')
    expect(select).toHaveBeenCalledWith('external_id', { count: 'exact', head: true })
    expect(eq).toHaveBeenCalledWith('email', 'aalovelace21@test.edu')
  })
})
