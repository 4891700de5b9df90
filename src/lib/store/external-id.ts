import type { EntityKind } from '@/lib/scheduling/errors'

const EXTERNAL_ID_FORMATS: Record<EntityKind, (sequence: number) => string> = {
  department: (sequence) => `DEP${sequence}`,
  course: (sequence) => `CRS${sequence}`,
  lecturer: (sequence) => `LECT${5000 + sequence}`,
  student: (sequence) => `${15000 + sequence}`,
  classSession: (sequence) => `CL${100 + sequence}`,
}

/** `sequence` is the store's 1-based per-kind counter, never a row count. */
export function formatExternalId(kind: EntityKind, sequence: number) {
  return EXTERNAL_ID_FORMATS[kind](sequence)
}
