import { InvalidArgsError, type EntityKind } from '@/lib/scheduling/errors'

/** Sortable fields per entity, mapped to their Postgres column. */
export const SORT_COLUMNS: Record<EntityKind, Record<string, string>> = {
  department: { id: 'external_id', name: 'name', code: 'code' },
  course: { id: 'external_id', name: 'name', code: 'code' },
  lecturer: { id: 'external_id', name: 'name', email: 'email' },
  student: { id: 'external_id', name: 'name', email: 'email', enrollmentYear: 'enrollment_year' },
  classSession: {
    id: 'external_id',
    day: 'day_of_week',
    startTime: 'start_time',
    location: 'location',
    maxCapacity: 'max_capacity',
  },
}

export function resolveSortField(kind: EntityKind, sortBy?: string) {
  const field = sortBy?.trim() || 'id'

  if (!Object.hasOwn(SORT_COLUMNS[kind], field)) {
    throw new InvalidArgsError(`Cannot sort ${kind} by "${field}"`, 'sortBy')
  }

  return field
}

export function resolveSortColumn(kind: EntityKind, sortBy?: string) {
  return SORT_COLUMNS[kind][resolveSortField(kind, sortBy)] ?? 'external_id'
}
