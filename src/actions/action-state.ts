import { isSchedulingError, type SchedulingErrorCode } from '@/lib/scheduling/errors'
import type { Actor } from '@/lib/authz'
import type { SchedulingStore } from '@/lib/store/types'

export type ActionStatus = 'idle' | 'success' | 'error'

export type ActionErrorCode = SchedulingErrorCode | 'FORBIDDEN' | 'VALIDATION_FAILED' | 'UNEXPECTED'

export interface ActionState<T = undefined> {
  status: ActionStatus
  message?: string
  code?: ActionErrorCode
  fieldErrors?: Record<string, string[]>
  data?: T
}

export interface ActionContext {
  store: SchedulingStore
  actor: Actor | null
}

export const initialActionState: ActionState<never> = { status: 'idle' }

export function makeErrorState(
  message: string,
  code: ActionErrorCode,
  fieldErrors?: Record<string, string[]>
): ActionState<never> {
  return {
    status: 'error',
    message,
    code,
    fieldErrors,
  }
}

export function makeSuccessState<T>(message: string, data: T): ActionState<T> {
  return {
    status: 'success',
    message,
    data,
  }
}

export function makeValidationErrorState(fieldErrors: Record<string, string[] | undefined>) {
  const cleaned: Record<string, string[]> = {}

  for (const [field, messages] of Object.entries(fieldErrors)) {
    if (messages && messages.length > 0) {
      cleaned[field] = messages
    }
  }

  return makeErrorState('Check the submitted values and try again.', 'VALIDATION_FAILED', cleaned)
}

export function makeForbiddenState(message: string) {
  return makeErrorState(message, 'FORBIDDEN')
}

/**
 * Turns a thrown error into a result. Scheduling errors keep their code and
 * message; anything else is logged under `label` and reported generically.
 */
export function toErrorState(label: string, error: unknown): ActionState<never> {
  if (isSchedulingError(error)) {
    return makeErrorState(error.message, error.code)
  }

  console.error(`[actions] ${label} failed`, error)
  return makeErrorState('Something went wrong while processing the request.', 'UNEXPECTED')
}
