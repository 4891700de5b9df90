import { ensureMemberActor, type Actor } from '@/lib/authz'
import { enrollStudent, listStudentsInClassSession, withdrawStudent } from '@/lib/scheduling/enrollment'
import { classSessionIdSchema } from '@/lib/validation/class-session'
import { pageRequestSchema } from '@/lib/validation/common'
import { enrollmentSchema } from '@/lib/validation/enrollment'
import type { EnrollmentResult, Page, Student } from '@/types/scheduling'

import {
  makeForbiddenState,
  makeSuccessState,
  makeValidationErrorState,
  toErrorState,
  type ActionContext,
  type ActionState,
} from './action-state'

// Students may only change their own enrollments.
function canActFor(actor: Actor, studentId: string) {
  return actor.role !== 'student' || actor.id === studentId
}

export async function enrollStudentAction(
  context: ActionContext,
  payload: unknown
): Promise<ActionState<EnrollmentResult>> {
  const actor = ensureMemberActor(context.actor)

  if (!actor) {
    return makeForbiddenState('Sign in to enroll in class sessions.')
  }

  const parsed = enrollmentSchema.safeParse(payload)

  if (!parsed.success) {
    return makeValidationErrorState(parsed.error.flatten().fieldErrors)
  }

  const { studentId, classSessionId } = parsed.data

  if (!canActFor(actor, studentId)) {
    return makeForbiddenState('Students can only enroll themselves.')
  }

  try {
    const result = await enrollStudent(context.store, studentId, classSessionId)
    return makeSuccessState(
      `${result.studentName} enrolled in ${result.courseName}. ${result.availableSeats} seat(s) left.`,
      result
    )
  } catch (error) {
    return toErrorState('enrollStudentAction', error)
  }
}

export async function withdrawStudentAction(
  context: ActionContext,
  payload: unknown
): Promise<ActionState<EnrollmentResult>> {
  const actor = ensureMemberActor(context.actor)

  if (!actor) {
    return makeForbiddenState('Sign in to manage enrollments.')
  }

  const parsed = enrollmentSchema.safeParse(payload)

  if (!parsed.success) {
    return makeValidationErrorState(parsed.error.flatten().fieldErrors)
  }

  const { studentId, classSessionId } = parsed.data

  if (!canActFor(actor, studentId)) {
    return makeForbiddenState('Students can only withdraw themselves.')
  }

  try {
    const result = await withdrawStudent(context.store, studentId, classSessionId)
    return makeSuccessState(`${result.studentName} withdrew from ${result.courseName}.`, result)
  } catch (error) {
    return toErrorState('withdrawStudentAction', error)
  }
}

export async function listClassSessionStudentsAction(
  context: ActionContext,
  payload: unknown
): Promise<ActionState<Page<Student>>> {
  if (!ensureMemberActor(context.actor)) {
    return makeForbiddenState('Sign in to view class rosters.')
  }

  const target = classSessionIdSchema.safeParse(payload)
  const paging = pageRequestSchema.safeParse(payload)

  if (!target.success) {
    return makeValidationErrorState(target.error.flatten().fieldErrors)
  }

  if (!paging.success) {
    return makeValidationErrorState(paging.error.flatten().fieldErrors)
  }

  try {
    const page = await listStudentsInClassSession(context.store, target.data.classSessionId, paging.data)
    return makeSuccessState(`${page.totalItems} student(s) enrolled.`, page)
  } catch (error) {
    return toErrorState('listClassSessionStudentsAction', error)
  }
}
