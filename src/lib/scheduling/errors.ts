export type SchedulingErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_ARGS'
  | 'ASSIGNMENT_CONFLICT'
  | 'SCHEDULE_CONFLICT'
  | 'CAPACITY_CONFLICT'
  | 'ENROLLMENT_CONFLICT'
  | 'DELETE_CONFLICT'
  | 'CONCURRENCY_CONFLICT'
  | 'STORE_FAILURE'

export type EntityKind = 'department' | 'course' | 'lecturer' | 'student' | 'classSession'

export const ENTITY_LABELS: Record<EntityKind, string> = {
  department: 'Department',
  course: 'Course',
  lecturer: 'Lecturer',
  student: 'Student',
  classSession: 'Class session',
}

/**
 * Base of every rule violation raised by the scheduling layer. Callers branch on
 * `code`; the message is safe to show to an end user.
 */
export class SchedulingError extends Error {
  readonly code: SchedulingErrorCode

  constructor(code: SchedulingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

export class NotFoundError extends SchedulingError {
  readonly entity: EntityKind
  readonly entityId: string

  constructor(entity: EntityKind, entityId: string, message?: string) {
    super('NOT_FOUND', message ?? `${ENTITY_LABELS[entity]} with ID: ${entityId} not found`)
    this.entity = entity
    this.entityId = entityId
  }
}

export class InvalidArgsError extends SchedulingError {
  readonly field: string | null

  constructor(message: string, field: string | null = null) {
    super('INVALID_ARGS', message)
    this.field = field
  }
}

export class AssignmentConflictError extends SchedulingError {
  readonly lecturerId: string
  readonly courseId: string

  constructor(lecturerId: string, courseId: string, message: string) {
    super('ASSIGNMENT_CONFLICT', message)
    this.lecturerId = lecturerId
    this.courseId = courseId
  }
}

export class ScheduleConflictError extends SchedulingError {
  readonly entity: EntityKind
  readonly entityId: string

  constructor(entity: EntityKind, entityId: string, message: string) {
    super('SCHEDULE_CONFLICT', message)
    this.entity = entity
    this.entityId = entityId
  }
}

export class CapacityConflictError extends SchedulingError {
  readonly classSessionId: string
  readonly maxCapacity: number

  constructor(classSessionId: string, maxCapacity: number, message?: string) {
    super(
      'CAPACITY_CONFLICT',
      message ?? `Class session ${classSessionId} has reached its maximum capacity of ${maxCapacity}`
    )
    this.classSessionId = classSessionId
    this.maxCapacity = maxCapacity
  }
}

export class EnrollmentConflictError extends SchedulingError {
  readonly studentId: string
  readonly classSessionId: string

  constructor(studentId: string, classSessionId: string, message: string) {
    super('ENROLLMENT_CONFLICT', message)
    this.studentId = studentId
    this.classSessionId = classSessionId
  }
}

export class DeleteConflictError extends SchedulingError {
  readonly entity: EntityKind
  readonly entityId: string

  constructor(entity: EntityKind, entityId: string, message: string) {
    super('DELETE_CONFLICT', message)
    this.entity = entity
    this.entityId = entityId
  }
}

export class ConcurrencyConflictError extends SchedulingError {
  readonly attempts: number

  constructor(attempts: number) {
    super(
      'CONCURRENCY_CONFLICT',
      `The change collided with a concurrent update ${attempts} time(s); try again`
    )
    this.attempts = attempts
  }
}

export class StoreError extends SchedulingError {
  constructor(message: string, cause?: unknown) {
    super('STORE_FAILURE', message, { cause })
  }
}

export function isSchedulingError(error: unknown): error is SchedulingError {
  return error instanceof SchedulingError
}
