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
import type { EntityKind } from '@/lib/scheduling/errors'
import { toMinutes } from '@/lib/scheduling/time-slot'

import { formatExternalId } from './external-id'
import { KeyedMutex } from './keyed-mutex'
import { buildPage, ensureValidPageRequest } from './pagination'
import { resolveSortField } from './sorting'
import type {
  ClassSessionFilter,
  CourseAssignmentFilter,
  CourseFilter,
  DepartmentFilter,
  EnrollmentFilter,
  EntityRecord,
  EntityRepository,
  LecturerFilter,
  NamedEntityRepository,
  RelationRepository,
  SchedulingStore,
  StagedChange,
  StoreTransaction,
  StudentFilter,
  TransactionOptions,
} from './types'

type SortValue = string | number

interface TableRules<T, F> {
  kind: EntityKind
  matches: (entity: T, filter: F) => boolean
  sortKeys: Record<string, (entity: T) => SortValue>
  toRecord: (entity: T) => EntityRecord
}

interface MemoryState {
  departments: Map<string, Department>
  courses: Map<string, Course>
  lecturers: Map<string, Lecturer>
  students: Map<string, Student>
  classSessions: Map<string, ClassSession>
  assignments: Map<string, CourseAssignment>
  enrollments: Map<string, Enrollment>
  sequences: Map<EntityKind, number>
}

function matchesIds(id: string, ids: string[] | undefined) {
  return !ids || ids.includes(id)
}

function compareValues(a: SortValue, b: SortValue) {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b
  }
  return String(a).localeCompare(String(b))
}

const departmentRules: TableRules<Department, DepartmentFilter> = {
  kind: 'department',
  matches: (entity, filter) => matchesIds(entity.id, filter.ids),
  sortKeys: { id: (e) => e.id, name: (e) => e.name, code: (e) => e.code },
  toRecord: (record) => ({ entity: 'department', record }),
}

const courseRules: TableRules<Course, CourseFilter> = {
  kind: 'course',
  matches: (entity, filter) =>
    matchesIds(entity.id, filter.ids) &&
    (filter.departmentId === undefined || entity.departmentId === filter.departmentId),
  sortKeys: { id: (e) => e.id, name: (e) => e.name, code: (e) => e.code },
  toRecord: (record) => ({ entity: 'course', record }),
}

const lecturerRules: TableRules<Lecturer, LecturerFilter> = {
  kind: 'lecturer',
  matches: (entity, filter) =>
    matchesIds(entity.id, filter.ids) &&
    (filter.departmentId === undefined || entity.departmentId === filter.departmentId) &&
    (filter.email === undefined || entity.email === filter.email),
  sortKeys: { id: (e) => e.id, name: (e) => e.name, email: (e) => e.email },
  toRecord: (record) => ({ entity: 'lecturer', record }),
}

const studentRules: TableRules<Student, StudentFilter> = {
  kind: 'student',
  matches: (entity, filter) =>
    matchesIds(entity.id, filter.ids) &&
    (filter.departmentId === undefined || entity.departmentId === filter.departmentId) &&
    (filter.email === undefined || entity.email === filter.email),
  sortKeys: {
    id: (e) => e.id,
    name: (e) => e.name,
    email: (e) => e.email,
    enrollmentYear: (e) => e.enrollmentYear,
  },
  toRecord: (record) => ({ entity: 'student', record }),
}

const classSessionRules: TableRules<ClassSession, ClassSessionFilter> = {
  kind: 'classSession',
  matches: (entity, filter) =>
    matchesIds(entity.id, filter.ids) &&
    (filter.courseId === undefined || entity.courseId === filter.courseId) &&
    (filter.lecturerId === undefined || entity.lecturerId === filter.lecturerId) &&
    (filter.day === undefined || entity.timeSlot.day === filter.day),
  sortKeys: {
    id: (e) => e.id,
    day: (e) => DAYS_OF_WEEK.indexOf(e.timeSlot.day),
    startTime: (e) => toMinutes(e.timeSlot.startTime),
    location: (e) => e.location,
    maxCapacity: (e) => e.maxCapacity,
  },
  toRecord: (record) => ({ entity: 'classSession', record }),
}

class MemoryRepository<T extends { id: string }, F> implements EntityRepository<T, F> {
  constructor(
    protected readonly table: Map<string, T>,
    protected readonly rules: TableRules<T, F>,
    private readonly stage: (change: StagedChange) => void
  ) {}

  async findById(id: string) {
    const entity = this.table.get(id)
    return entity ? structuredClone(entity) : null
  }

  async findAll(filter?: F) {
    return this.select(filter, 'id')
  }

  async list(request: PageRequest, filter?: F): Promise<Page<T>> {
    ensureValidPageRequest(request)
    const sortField = resolveSortField(this.rules.kind, request.sortBy)
    const rows = this.select(filter, sortField)
    const from = request.page * request.size
    return buildPage(rows.slice(from, from + request.size), request, rows.length)
  }

  async count(filter?: F) {
    return this.select(filter, 'id').length
  }

  async save(entity: T) {
    const record = structuredClone(entity)
    this.stage({ kind: 'save', ...this.rules.toRecord(record) })
    return structuredClone(record)
  }

  async delete(id: string) {
    this.stage({ kind: 'delete', entity: this.rules.kind, id })
  }

  protected select(filter: F | undefined, sortField: string): T[] {
    const sortKey = this.rules.sortKeys[sortField] ?? ((entity: T) => entity.id)

    return Array.from(this.table.values())
      .filter((entity) => (filter ? this.rules.matches(entity, filter) : true))
      .sort((a, b) => compareValues(sortKey(a), sortKey(b)) || a.id.localeCompare(b.id))
      .map((entity) => structuredClone(entity))
  }
}

class NamedMemoryRepository<T extends { id: string; name: string }, F>
  extends MemoryRepository<T, F>
  implements NamedEntityRepository<T, F>
{
  async findByName(name: string) {
    const target = name.trim().toLowerCase()
    return this.select(undefined, 'id').find((entity) => entity.name.toLowerCase() === target) ?? null
  }

  async findByNameContaining(fragment: string) {
    const target = fragment.trim().toLowerCase()
    return this.select(undefined, 'name').find((entity) => entity.name.toLowerCase().includes(target)) ?? null
  }
}

interface RelationRules<R, F> {
  keyOf: (relation: R) => string
  matches: (relation: R, filter: F) => boolean
  addChange: (relation: R) => StagedChange
  removeChange: (relation: R) => StagedChange
}

class MemoryRelationRepository<R, F> implements RelationRepository<R, F> {
  constructor(
    private readonly table: Map<string, R>,
    private readonly rules: RelationRules<R, F>,
    private readonly stage: (change: StagedChange) => void
  ) {}

  async exists(relation: R) {
    return this.table.has(this.rules.keyOf(relation))
  }

  async findAll(filter: F) {
    return Array.from(this.table.values())
      .filter((relation) => this.rules.matches(relation, filter))
      .map((relation) => structuredClone(relation))
  }

  async count(filter: F) {
    return (await this.findAll(filter)).length
  }

  async add(relation: R) {
    this.stage(this.rules.addChange(structuredClone(relation)))
  }

  async remove(relation: R) {
    this.stage(this.rules.removeChange(structuredClone(relation)))
  }
}

const assignmentRules: RelationRules<CourseAssignment, CourseAssignmentFilter> = {
  keyOf: (relation) => `${relation.lecturerId}|${relation.courseId}`,
  matches: (relation, filter) =>
    (filter.lecturerId === undefined || relation.lecturerId === filter.lecturerId) &&
    (filter.courseId === undefined || relation.courseId === filter.courseId),
  addChange: (relation) => ({ kind: 'addAssignment', relation }),
  removeChange: (relation) => ({ kind: 'removeAssignment', relation }),
}

const enrollmentRules: RelationRules<Enrollment, EnrollmentFilter> = {
  keyOf: (relation) => `${relation.studentId}|${relation.classSessionId}`,
  matches: (relation, filter) =>
    (filter.studentId === undefined || relation.studentId === filter.studentId) &&
    (filter.classSessionId === undefined || relation.classSessionId === filter.classSessionId) &&
    (filter.classSessionIds === undefined || filter.classSessionIds.includes(relation.classSessionId)),
  addChange: (relation) => ({ kind: 'addEnrollment', relation }),
  removeChange: (relation) => ({ kind: 'removeEnrollment', relation }),
}

/**
 * Process-local store. Transactions sharing a lock key run one after another;
 * staged writes are applied only when the work function resolves.
 */
export class InMemorySchedulingStore implements SchedulingStore {
  private readonly state: MemoryState = {
    departments: new Map(),
    courses: new Map(),
    lecturers: new Map(),
    students: new Map(),
    classSessions: new Map(),
    assignments: new Map(),
    enrollments: new Map(),
    sequences: new Map(),
  }

  private readonly mutex = new KeyedMutex()

  async transaction<T>(options: TransactionOptions, work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const release = await this.mutex.acquire(options.locks)

    try {
      const changes: StagedChange[] = []
      const result = await work(this.createTransaction(changes))
      this.commit(changes)
      return result
    } finally {
      release()
    }
  }

  private createTransaction(changes: StagedChange[]): StoreTransaction {
    const stage = (change: StagedChange) => {
      changes.push(change)
    }

    return {
      departments: new NamedMemoryRepository(this.state.departments, departmentRules, stage),
      courses: new NamedMemoryRepository(this.state.courses, courseRules, stage),
      lecturers: new NamedMemoryRepository(this.state.lecturers, lecturerRules, stage),
      students: new NamedMemoryRepository(this.state.students, studentRules, stage),
      classSessions: new MemoryRepository(this.state.classSessions, classSessionRules, stage),
      assignments: new MemoryRelationRepository(this.state.assignments, assignmentRules, stage),
      enrollments: new MemoryRelationRepository(this.state.enrollments, enrollmentRules, stage),
      nextExternalId: async (kind) => {
        // Sequences advance outside the transaction, like a database sequence.
        const next = (this.state.sequences.get(kind) ?? 0) + 1
        this.state.sequences.set(kind, next)
        return formatExternalId(kind, next)
      },
    }
  }

  private commit(changes: StagedChange[]) {
    for (const change of changes) {
      switch (change.kind) {
        case 'save':
          this.applySave(change)
          break
        case 'delete':
          this.tableFor(change.entity).delete(change.id)
          break
        case 'addAssignment':
          this.state.assignments.set(assignmentRules.keyOf(change.relation), change.relation)
          break
        case 'removeAssignment':
          this.state.assignments.delete(assignmentRules.keyOf(change.relation))
          break
        case 'addEnrollment':
          this.state.enrollments.set(enrollmentRules.keyOf(change.relation), change.relation)
          break
        case 'removeEnrollment':
          this.state.enrollments.delete(enrollmentRules.keyOf(change.relation))
          break
      }
    }
  }

  private applySave(change: EntityRecord) {
    switch (change.entity) {
      case 'department':
        this.state.departments.set(change.record.id, change.record)
        break
      case 'course':
        this.state.courses.set(change.record.id, change.record)
        break
      case 'lecturer':
        this.state.lecturers.set(change.record.id, change.record)
        break
      case 'student':
        this.state.students.set(change.record.id, change.record)
        break
      case 'classSession':
        this.state.classSessions.set(change.record.id, change.record)
        break
    }
  }

  private tableFor(kind: EntityKind): Map<string, unknown> {
    switch (kind) {
      case 'department':
        return this.state.departments
      case 'course':
        return this.state.courses
      case 'lecturer':
        return this.state.lecturers
      case 'student':
        return this.state.students
      case 'classSession':
        return this.state.classSessions
    }
  }
}
