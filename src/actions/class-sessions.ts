import { ensureAdminActor, ensureMemberActor } from '@/lib/authz'
import {
  createClassSession,
  getClassSession,
  listClassSessions,
  updateClassSession,
  type ClassSessionListScope,
} from '@/lib/scheduling/class-sessions'
import { deleteClassSession } from '@/lib/scheduling/integrity'
import {
  classSessionIdSchema,
  createClassSessionSchema,
  updateClassSessionSchema,
} from '@/lib/validation/class-session'
import { pageRequestSchema } from '@/lib/validation/common'
import type { ClassSessionView, Page } from '@/types/scheduling'

import {
  makeForbiddenState,
  makeSuccessState,
  makeValidationErrorState,
  toErrorState,
  type ActionContext,
  type ActionState,
} from './action-state'

export async function createClassSessionAction(
  context: ActionContext,
  payload: unknown
): Promise<ActionState<ClassSessionView>> {
  if (!ensureAdminActor(context.actor)) {
    return makeForbiddenState('You are not allowed to create class sessions.')
  }

  const parsed = createClassSessionSchema.safeParse(payload)

  if (!parsed.success) {
    return makeValidationErrorState(parsed.error.flatten().fieldErrors)
  }

  try {
    const view = await createClassSession(context.store, parsed.data)
    return makeSuccessState(`Class session ${view.id} created.`, view)
  } catch (error) {
    return toErrorState('createClassSessionAction', error)
  }
}

export async function updateClassSessionAction(
  context: ActionContext,
  payload: unknown
): Promise<ActionState<ClassSessionView>> {
  if (!ensureAdminActor(context.actor)) {
    return makeForbiddenState('You are not allowed to update class sessions.')
  }

  const parsed = updateClassSessionSchema.safeParse(payload)

  if (!parsed.success) {
    return makeValidationErrorState(parsed.error.flatten().fieldErrors)
  }

  const { classSessionId, ...patch } = parsed.data

  try {
    const view = await updateClassSession(context.store, classSessionId, patch)
    return makeSuccessState(`Class session ${view.id} updated.`, view)
  } catch (error) {
    return toErrorState('updateClassSessionAction', error)
  }
}

export async function deleteClassSessionAction(
  context: ActionContext,
  payload: unknown
): Promise<ActionState<{ classSessionId: string }>> {
  if (!ensureAdminActor(context.actor)) {
    return makeForbiddenState('You are not allowed to delete class sessions.')
  }

  const parsed = classSessionIdSchema.safeParse(payload)

  if (!parsed.success) {
    return makeValidationErrorState(parsed.error.flatten().fieldErrors)
  }

  try {
    await deleteClassSession(context.store, parsed.data.classSessionId)
    return makeSuccessState(`Class session ${parsed.data.classSessionId} deleted.`, {
      classSessionId: parsed.data.classSessionId,
    })
  } catch (error) {
    return toErrorState('deleteClassSessionAction', error)
  }
}

export async function getClassSessionAction(
  context: ActionContext,
  payload: unknown
): Promise<ActionState<ClassSessionView>> {
  if (!ensureMemberActor(context.actor)) {
    return makeForbiddenState('Sign in to view class sessions.')
  }

  const parsed = classSessionIdSchema.safeParse(payload)

  if (!parsed.success) {
    return makeValidationErrorState(parsed.error.flatten().fieldErrors)
  }

  try {
    const view = await getClassSession(context.store, parsed.data.classSessionId)
    return makeSuccessState('Class session loaded.', view)
  } catch (error) {
    return toErrorState('getClassSessionAction', error)
  }
}

export async function listClassSessionsAction(
  context: ActionContext,
  payload: unknown,
  scope: ClassSessionListScope = { kind: 'all' }
): Promise<ActionState<Page<ClassSessionView>>> {
  if (!ensureMemberActor(context.actor)) {
    return makeForbiddenState('Sign in to view class sessions.')
  }

  const parsed = pageRequestSchema.safeParse(payload)

  if (!parsed.success) {
    return makeValidationErrorState(parsed.error.flatten().fieldErrors)
  }

  try {
    const page = await listClassSessions(context.store, parsed.data, scope)
    return makeSuccessState(`${page.items.length} class session(s) loaded.`, page)
  } catch (error) {
    return toErrorState('listClassSessionsAction', error)
  }
}
