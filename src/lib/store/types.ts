import type {
  ClassSession,
  Course,
  CourseAssignment,
  DayOfWeek,
  Department,
  Enrollment,
  Lecturer,
  Page,
  PageRequest,
  Student,
} from '@/types/scheduling'
import type { EntityKind } from '@/lib/scheduling/errors'

export interface DepartmentFilter {
  ids?: string[]
}

export interface CourseFilter {
  ids?: string[]
  departmentId?: string
}

export interface LecturerFilter {
  ids?: string[]
  departmentId?: string
  email?: string
}

export interface StudentFilter {
  ids?: string[]
  departmentId?: string
  email?: string
}

export interface ClassSessionFilter {
  ids?: string[]
  courseId?: string
  lecturerId?: string
  day?: DayOfWeek
}

export interface CourseAssignmentFilter {
  lecturerId?: string
  courseId?: string
}

export interface EnrollmentFilter {
  studentId?: string
  classSessionId?: string
  classSessionIds?: string[]
}

export interface EntityRepository<T extends { id: string }, F> {
  findById(id: string): Promise<T | null>
  findAll(filter?: F): Promise<T[]>
  list(request: PageRequest, filter?: F): Promise<Page<T>>
  count(filter?: F): Promise<number>
  save(entity: T): Promise<T>
  delete(id: string): Promise<void>
}

export interface NamedEntityRepository<T extends { id: string; name: string }, F>
  extends EntityRepository<T, F> {
  /** Case-insensitive exact match. */
  findByName(name: string): Promise<T | null>
  /** Case-insensitive substring match; first hit in name order. */
  findByNameContaining(fragment: string): Promise<T | null>
}

export interface RelationRepository<R, F> {
  exists(relation: R): Promise<boolean>
  findAll(filter: F): Promise<R[]>
  count(filter: F): Promise<number>
  add(relation: R): Promise<void>
  remove(relation: R): Promise<void>
}

/**
 * One unit of work against the store. Reads return committed state; writes are
 * staged and become visible together when the transaction commits, so work must
 * not rely on reading its own writes.
 */
export interface StoreTransaction {
  departments: NamedEntityRepository<Department, DepartmentFilter>
  courses: NamedEntityRepository<Course, CourseFilter>
  lecturers: NamedEntityRepository<Lecturer, LecturerFilter>
  students: NamedEntityRepository<Student, StudentFilter>
  classSessions: EntityRepository<ClassSession, ClassSessionFilter>
  assignments: RelationRepository<CourseAssignment, CourseAssignmentFilter>
  enrollments: RelationRepository<Enrollment, EnrollmentFilter>
  nextExternalId(kind: EntityKind): Promise<string>
}

export interface TransactionOptions {
  /** Entity keys from `lockKey`; transactions sharing a key are serialized. */
  locks: string[]
  label?: string
}

export interface SchedulingStore {
  transaction<T>(options: TransactionOptions, work: (tx: StoreTransaction) => Promise<T>): Promise<T>
}

export function lockKey(kind: EntityKind, id: string) {
  return `${kind}:${id}`
}

export function parseLockKey(key: string): { kind: EntityKind; id: string } | null {
  const separator = key.indexOf(':')

  if (separator <= 0) {
    return null
  }

  const kind = key.slice(0, separator)
  const id = key.slice(separator + 1)

  if (!isEntityKind(kind) || !id) {
    return null
  }

  return { kind, id }
}

function isEntityKind(value: string): value is EntityKind {
  return ['department', 'course', 'lecturer', 'student', 'classSession'].includes(value)
}

export type EntityRecord =
  | { entity: 'department'; record: Department }
  | { entity: 'course'; record: Course }
  | { entity: 'lecturer'; record: Lecturer }
  | { entity: 'student'; record: Student }
  | { entity: 'classSession'; record: ClassSession }

export type StagedChange =
  | ({ kind: 'save' } & EntityRecord)
  | { kind: 'delete'; entity: EntityKind; id: string }
  | { kind: 'addAssignment'; relation: CourseAssignment }
  | { kind: 'removeAssignment'; relation: CourseAssignment }
  | { kind: 'addEnrollment'; relation: Enrollment }
  | { kind: 'removeEnrollment'; relation: Enrollment }
