import type { SupabaseClient } from '@supabase/supabase-js'

import type {
  ClassSession,
  Course,
  CourseAssignment,
  Department,
  Enrollment,
  Lecturer,
  Page,
  PageRequest,
  Student,
} from '@/types/scheduling'
import { DAYS_OF_WEEK } from '@/types/scheduling'
import { getConfig, type AppConfig } from '@/lib/env'
import { createAdminClient } from '@/lib/supabase/admin'
import {
  ConcurrencyConflictError,
  StoreError,
  type EntityKind,
} from '@/lib/scheduling/errors'
import { createTimeSlot } from '@/lib/scheduling/time-slot'

import { formatExternalId } from './external-id'
import { buildPage, ensureValidPageRequest, pageRange } from './pagination'
import { resolveSortColumn } from './sorting'
import {
  parseLockKey,
  type ClassSessionFilter,
  type CourseAssignmentFilter,
  type CourseFilter,
  type DepartmentFilter,
  type EnrollmentFilter,
  type EntityRecord,
  type EntityRepository,
  type LecturerFilter,
  type NamedEntityRepository,
  type RelationRepository,
  type SchedulingStore,
  type StagedChange,
  type StoreTransaction,
  type StudentFilter,
  type TransactionOptions,
} from './types'

/** Postgres serialization_failure, raised by commit_scheduling_changes on a version mismatch. */
const SERIALIZATION_FAILURE = '40001'

export const ENTITY_TABLES: Record<EntityKind, string> = {
  department: 'departments',
  course: 'courses',
  lecturer: 'lecturers',
  student: 'students',
  classSession: 'class_sessions',
}

export interface DepartmentRow {
  external_id: string
  name: string
  code: string
}

export interface CourseRow {
  external_id: string
  name: string
  code: string
  department_id: string
}

export interface LecturerRow {
  external_id: string
  name: string
  email: string
  phone: string
  department_id: string
}

export interface StudentRow {
  external_id: string
  name: string
  email: string
  phone: string
  department_id: string
  enrollment_year: number
}

export interface ClassSessionRow {
  external_id: string
  course_id: string
  lecturer_id: string
  day_of_week: number
  start_time: string
  end_time: string
  location: string
  max_capacity: number
}

interface CourseAssignmentRow {
  lecturer_id: string
  course_id: string
}

interface EnrollmentRow {
  student_id: string
  class_session_id: string
}

interface VersionRow {
  external_id: string
  version: number
}

type RowValue = string | number

type Condition =
  | { op: 'eq'; column: string; value: RowValue }
  | { op: 'in'; column: string; values: string[] }

export function mapClassSessionRow(row: ClassSessionRow): ClassSession {
  const day = DAYS_OF_WEEK[row.day_of_week - 1]

  if (!day) {
    throw new StoreError(`Class session ${row.external_id} has an invalid day_of_week (${row.day_of_week})`)
  }

  return {
    id: row.external_id,
    courseId: row.course_id,
    lecturerId: row.lecturer_id,
    timeSlot: createTimeSlot(day, row.start_time, row.end_time),
    location: row.location,
    maxCapacity: row.max_capacity,
  }
}

export function toClassSessionRow(session: ClassSession): ClassSessionRow {
  return {
    external_id: session.id,
    course_id: session.courseId,
    lecturer_id: session.lecturerId,
    day_of_week: DAYS_OF_WEEK.indexOf(session.timeSlot.day) + 1,
    start_time: `${session.timeSlot.startTime}:00`,
    end_time: `${session.timeSlot.endTime}:00`,
    location: session.location,
    max_capacity: session.maxCapacity,
  }
}

function idsCondition(ids: string[] | undefined): Condition[] {
  return ids ? [{ op: 'in', column: 'external_id', values: ids }] : []
}

function departmentCondition(departmentId: string | undefined): Condition[] {
  return departmentId === undefined ? [] : [{ op: 'eq', column: 'department_id', value: departmentId }]
}

function emailCondition(email: string | undefined): Condition[] {
  return email === undefined ? [] : [{ op: 'eq', column: 'email', value: email }]
}

function escapeLike(value: string) {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`)
}

interface TableBinding<T, F, R> {
  kind: EntityKind
  select: string
  fromRow: (row: R) => T
  toRow: (entity: T) => R
  conditions: (filter: F) => Condition[]
  toRecord: (entity: T) => EntityRecord
}

const departmentBinding: TableBinding<Department, DepartmentFilter, DepartmentRow> = {
  kind: 'department',
  select: 'external_id, name, code',
  fromRow: (row) => ({ id: row.external_id, name: row.name, code: row.code }),
  toRow: (entity) => ({ external_id: entity.id, name: entity.name, code: entity.code }),
  conditions: (filter) => idsCondition(filter.ids),
  toRecord: (record) => ({ entity: 'department', record }),
}

const courseBinding: TableBinding<Course, CourseFilter, CourseRow> = {
  kind: 'course',
  select: 'external_id, name, code, department_id',
  fromRow: (row) => ({ id: row.external_id, name: row.name, code: row.code, departmentId: row.department_id }),
  toRow: (entity) => ({
    external_id: entity.id,
    name: entity.name,
    code: entity.code,
    department_id: entity.departmentId,
  }),
  conditions: (filter) => [...idsCondition(filter.ids), ...departmentCondition(filter.departmentId)],
  toRecord: (record) => ({ entity: 'course', record }),
}

const lecturerBinding: TableBinding<Lecturer, LecturerFilter, LecturerRow> = {
  kind: 'lecturer',
  select: 'external_id, name, email, phone, department_id',
  fromRow: (row) => ({
    id: row.external_id,
    name: row.name,
    email: row.email,
    phone: row.phone,
    departmentId: row.department_id,
  }),
  toRow: (entity) => ({
    external_id: entity.id,
    name: entity.name,
    email: entity.email,
    phone: entity.phone,
    department_id: entity.departmentId,
  }),
  conditions: (filter) => [
    ...idsCondition(filter.ids),
    ...departmentCondition(filter.departmentId),
    ...emailCondition(filter.email),
  ],
  toRecord: (record) => ({ entity: 'lecturer', record }),
}

const studentBinding: TableBinding<Student, StudentFilter, StudentRow> = {
  kind: 'student',
  select: 'external_id, name, email, phone, department_id, enrollment_year',
  fromRow: (row) => ({
    id: row.external_id,
    name: row.name,
    email: row.email,
    phone: row.phone,
    departmentId: row.department_id,
    enrollmentYear: row.enrollment_year,
  }),
  toRow: (entity) => ({
    external_id: entity.id,
    name: entity.name,
    email: entity.email,
    phone: entity.phone,
    department_id: entity.departmentId,
    enrollment_year: entity.enrollmentYear,
  }),
  conditions: (filter) => [
    ...idsCondition(filter.ids),
    ...departmentCondition(filter.departmentId),
    ...emailCondition(filter.email),
  ],
  toRecord: (record) => ({ entity: 'student', record }),
}

const classSessionBinding: TableBinding<ClassSession, ClassSessionFilter, ClassSessionRow> = {
  kind: 'classSession',
  select: 'external_id, course_id, lecturer_id, day_of_week, start_time, end_time, location, max_capacity',
  fromRow: mapClassSessionRow,
  toRow: toClassSessionRow,
  conditions: (filter) => {
    const conditions = idsCondition(filter.ids)
    if (filter.courseId !== undefined) {
      conditions.push({ op: 'eq', column: 'course_id', value: filter.courseId })
    }
    if (filter.lecturerId !== undefined) {
      conditions.push({ op: 'eq', column: 'lecturer_id', value: filter.lecturerId })
    }
    if (filter.day !== undefined) {
      conditions.push({ op: 'eq', column: 'day_of_week', value: DAYS_OF_WEEK.indexOf(filter.day) + 1 })
    }
    return conditions
  },
  toRecord: (record) => ({ entity: 'classSession', record }),
}

function toRowRecord(change: EntityRecord): Record<string, RowValue> {
  switch (change.entity) {
    case 'department':
      return { ...departmentBinding.toRow(change.record) }
    case 'course':
      return { ...courseBinding.toRow(change.record) }
    case 'lecturer':
      return { ...lecturerBinding.toRow(change.record) }
    case 'student':
      return { ...studentBinding.toRow(change.record) }
    case 'classSession':
      return { ...toClassSessionRow(change.record) }
  }
}

export function serializeChange(change: StagedChange) {
  switch (change.kind) {
    case 'save':
      return { kind: change.kind, entity: change.entity, record: toRowRecord(change) }
    case 'delete':
      return { kind: change.kind, entity: change.entity, id: change.id }
    case 'addAssignment':
    case 'removeAssignment':
      return {
        kind: change.kind,
        record: { lecturer_id: change.relation.lecturerId, course_id: change.relation.courseId },
      }
    case 'addEnrollment':
    case 'removeEnrollment':
      return {
        kind: change.kind,
        record: { student_id: change.relation.studentId, class_session_id: change.relation.classSessionId },
      }
  }
}

class SupabaseRepository<T extends { id: string }, F, R> implements EntityRepository<T, F> {
  constructor(
    protected readonly client: SupabaseClient,
    protected readonly binding: TableBinding<T, F, R>,
    private readonly stage: (change: StagedChange) => void
  ) {}

  protected get table() {
    return ENTITY_TABLES[this.binding.kind]
  }

  async findById(id: string) {
    const { data, error } = await this.client
      .from(this.table)
      .select(this.binding.select)
      .eq('external_id', id)
      .maybeSingle<R>()

    if (error) {
      throw this.failure('findById', error)
    }

    return data ? this.binding.fromRow(data) : null
  }

  async findAll(filter?: F) {
    let query = this.client.from(this.table).select(this.binding.select)

    for (const condition of filter ? this.binding.conditions(filter) : []) {
      query = condition.op === 'eq' ? query.eq(condition.column, condition.value) : query.in(condition.column, condition.values)
    }

    const { data, error } = await query.order('external_id').returns<R[]>()

    if (error) {
      throw this.failure('findAll', error)
    }

    return (data ?? []).map((row) => this.binding.fromRow(row))
  }

  async list(request: PageRequest, filter?: F): Promise<Page<T>> {
    ensureValidPageRequest(request)
    const sortColumn = resolveSortColumn(this.binding.kind, request.sortBy)
    const { from, to } = pageRange(request)

    let query = this.client.from(this.table).select(this.binding.select, { count: 'exact' })

    for (const condition of filter ? this.binding.conditions(filter) : []) {
      query = condition.op === 'eq' ? query.eq(condition.column, condition.value) : query.in(condition.column, condition.values)
    }

    const { data, error, count } = await query
      .order(sortColumn)
      .order('external_id')
      .range(from, to)
      .returns<R[]>()

    if (error) {
      throw this.failure('list', error)
    }

    const items = (data ?? []).map((row) => this.binding.fromRow(row))
    return buildPage(items, request, count ?? items.length)
  }

  async count(filter?: F) {
    let query = this.client.from(this.table).select('external_id', { count: 'exact', head: true })

    for (const condition of filter ? this.binding.conditions(filter) : []) {
      query = condition.op === 'eq' ? query.eq(condition.column, condition.value) : query.in(condition.column, condition.values)
    }

    const { count, error } = await query

    if (error) {
      throw this.failure('count', error)
    }

    return count ?? 0
  }

  async save(entity: T) {
    this.stage({ kind: 'save', ...this.binding.toRecord(entity) })
    return entity
  }

  async delete(id: string) {
    this.stage({ kind: 'delete', entity: this.binding.kind, id })
  }

  protected failure(operation: string, error: unknown) {
    console.error(`[store] ${this.table} ${operation} error`, error)
    return new StoreError(`Failed to read ${this.table}`, error)
  }
}

class NamedSupabaseRepository<T extends { id: string; name: string }, F, R>
  extends SupabaseRepository<T, F, R>
  implements NamedEntityRepository<T, F>
{
  async findByName(name: string) {
    return this.findFirstByPattern(escapeLike(name.trim()), 'findByName')
  }

  async findByNameContaining(fragment: string) {
    return this.findFirstByPattern(`%${escapeLike(fragment.trim())}%`, 'findByNameContaining')
  }

  private async findFirstByPattern(pattern: string, operation: string) {
    const { data, error } = await this.client
      .from(this.table)
      .select(this.binding.select)
      .ilike('name', pattern)
      .order('name')
      .order('external_id')
      .limit(1)
      .returns<R[]>()

    if (error) {
      throw this.failure(operation, error)
    }

    const [row] = data ?? []
    return row ? this.binding.fromRow(row) : null
  }
}

interface RelationBinding<Rel, F, Row> {
  table: string
  columns: string
  fromRow: (row: Row) => Rel
  keyConditions: (relation: Rel) => Condition[]
  conditions: (filter: F) => Condition[]
  addChange: (relation: Rel) => StagedChange
  removeChange: (relation: Rel) => StagedChange
}

const assignmentBinding: RelationBinding<CourseAssignment, CourseAssignmentFilter, CourseAssignmentRow> = {
  table: 'lecturer_courses',
  columns: 'lecturer_id, course_id',
  fromRow: (row) => ({ lecturerId: row.lecturer_id, courseId: row.course_id }),
  keyConditions: (relation) => [
    { op: 'eq', column: 'lecturer_id', value: relation.lecturerId },
    { op: 'eq', column: 'course_id', value: relation.courseId },
  ],
  conditions: (filter) => {
    const conditions: Condition[] = []
    if (filter.lecturerId !== undefined) {
      conditions.push({ op: 'eq', column: 'lecturer_id', value: filter.lecturerId })
    }
    if (filter.courseId !== undefined) {
      conditions.push({ op: 'eq', column: 'course_id', value: filter.courseId })
    }
    return conditions
  },
  addChange: (relation) => ({ kind: 'addAssignment', relation }),
  removeChange: (relation) => ({ kind: 'removeAssignment', relation }),
}

const enrollmentBinding: RelationBinding<Enrollment, EnrollmentFilter, EnrollmentRow> = {
  table: 'enrollments',
  columns: 'student_id, class_session_id',
  fromRow: (row) => ({ studentId: row.student_id, classSessionId: row.class_session_id }),
  keyConditions: (relation) => [
    { op: 'eq', column: 'student_id', value: relation.studentId },
    { op: 'eq', column: 'class_session_id', value: relation.classSessionId },
  ],
  conditions: (filter) => {
    const conditions: Condition[] = []
    if (filter.studentId !== undefined) {
      conditions.push({ op: 'eq', column: 'student_id', value: filter.studentId })
    }
    if (filter.classSessionId !== undefined) {
      conditions.push({ op: 'eq', column: 'class_session_id', value: filter.classSessionId })
    }
    if (filter.classSessionIds !== undefined) {
      conditions.push({ op: 'in', column: 'class_session_id', values: filter.classSessionIds })
    }
    return conditions
  },
  addChange: (relation) => ({ kind: 'addEnrollment', relation }),
  removeChange: (relation) => ({ kind: 'removeEnrollment', relation }),
}

class SupabaseRelationRepository<Rel, F, Row> implements RelationRepository<Rel, F> {
  constructor(
    private readonly client: SupabaseClient,
    private readonly binding: RelationBinding<Rel, F, Row>,
    private readonly stage: (change: StagedChange) => void
  ) {}

  async exists(relation: Rel) {
    return (await this.countWhere(this.binding.keyConditions(relation))) > 0
  }

  async findAll(filter: F) {
    let query = this.client.from(this.binding.table).select(this.binding.columns)

    for (const condition of this.binding.conditions(filter)) {
      query = condition.op === 'eq' ? query.eq(condition.column, condition.value) : query.in(condition.column, condition.values)
    }

    const { data, error } = await query.returns<Row[]>()

    if (error) {
      console.error(`[store] ${this.binding.table} findAll error`, error)
      throw new StoreError(`Failed to read ${this.binding.table}`, error)
    }

    return (data ?? []).map((row) => this.binding.fromRow(row))
  }

  async count(filter: F) {
    return this.countWhere(this.binding.conditions(filter))
  }

  async add(relation: Rel) {
    this.stage(this.binding.addChange(relation))
  }

  async remove(relation: Rel) {
    this.stage(this.binding.removeChange(relation))
  }

  private async countWhere(conditions: Condition[]) {
    let query = this.client.from(this.binding.table).select('*', { count: 'exact', head: true })

    for (const condition of conditions) {
      query = condition.op === 'eq' ? query.eq(condition.column, condition.value) : query.in(condition.column, condition.values)
    }

    const { count, error } = await query

    if (error) {
      console.error(`[store] ${this.binding.table} count error`, error)
      throw new StoreError(`Failed to count ${this.binding.table}`, error)
    }

    return count ?? 0
  }
}

interface ExpectedVersion {
  entity: EntityKind
  id: string
  version: number | null
}

export interface SupabaseStoreOptions {
  /** Extra attempts after a version conflict before giving up. */
  retries: number
}

/**
 * Postgres-backed store. Concurrency is optimistic: the versions of locked rows
 * are captured before the work runs, and `commit_scheduling_changes` applies
 * the staged writes only if none of those versions moved in the meantime.
 */
export class SupabaseSchedulingStore implements SchedulingStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly options: SupabaseStoreOptions = { retries: 3 }
  ) {}

  async transaction<T>(options: TransactionOptions, work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const maxAttempts = this.options.retries + 1

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const expectedVersions = await this.readVersions(options.locks)
      const changes: StagedChange[] = []
      const result = await work(this.createTransaction(changes))

      if (changes.length === 0) {
        return result
      }

      const { error } = await this.client.rpc('commit_scheduling_changes', {
        expected_versions: expectedVersions,
        changes: changes.map(serializeChange),
      })

      if (!error) {
        return result
      }

      if (error.code === SERIALIZATION_FAILURE) {
        console.warn('[store] version conflict, retrying', { label: options.label, attempt })
        continue
      }

      console.error('[store] commit_scheduling_changes error', { label: options.label, error })
      throw new StoreError('Failed to save changes', error)
    }

    throw new ConcurrencyConflictError(maxAttempts)
  }

  private async readVersions(locks: string[]): Promise<ExpectedVersion[]> {
    const idsByKind = new Map<EntityKind, string[]>()

    for (const key of new Set(locks)) {
      const parsed = parseLockKey(key)
      if (!parsed) {
        throw new StoreError(`Invalid lock key: ${key}`)
      }
      const ids = idsByKind.get(parsed.kind) ?? []
      ids.push(parsed.id)
      idsByKind.set(parsed.kind, ids)
    }

    const expected: ExpectedVersion[] = []

    for (const [kind, ids] of idsByKind) {
      const { data, error } = await this.client
        .from(ENTITY_TABLES[kind])
        .select('external_id, version')
        .in('external_id', ids)
        .returns<VersionRow[]>()

      if (error) {
        console.error('[store] failed to read row versions', { kind, error })
        throw new StoreError('Failed to read row versions', error)
      }

      const versions = new Map((data ?? []).map((row) => [row.external_id, row.version]))
      ids.forEach((id) => expected.push({ entity: kind, id, version: versions.get(id) ?? null }))
    }

    return expected
  }

  private createTransaction(changes: StagedChange[]): StoreTransaction {
    const stage = (change: StagedChange) => {
      changes.push(change)
    }

    return {
      departments: new NamedSupabaseRepository(this.client, departmentBinding, stage),
      courses: new NamedSupabaseRepository(this.client, courseBinding, stage),
      lecturers: new NamedSupabaseRepository(this.client, lecturerBinding, stage),
      students: new NamedSupabaseRepository(this.client, studentBinding, stage),
      classSessions: new SupabaseRepository(this.client, classSessionBinding, stage),
      assignments: new SupabaseRelationRepository(this.client, assignmentBinding, stage),
      enrollments: new SupabaseRelationRepository(this.client, enrollmentBinding, stage),
      nextExternalId: async (kind) => {
        const { data, error } = await this.client.rpc('next_external_sequence', { kind })

        if (error || typeof data !== 'number') {
          console.error('[store] next_external_sequence error', { kind, error })
          throw new StoreError('Failed to issue an external ID', error)
        }

        return formatExternalId(kind, data)
      },
    }
  }
}

export function createSupabaseSchedulingStore(config: AppConfig = getConfig()) {
  return new SupabaseSchedulingStore(createAdminClient(config), { retries: config.STORE_TRANSACTION_RETRIES })
}
