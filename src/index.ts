export * from './types/scheduling'
export * from './lib/scheduling/errors'
export * from './lib/scheduling/time-slot'
export * from './lib/scheduling/capacity'
export * from './lib/scheduling/class-sessions'
export * from './lib/scheduling/enrollment'
export * from './lib/scheduling/integrity'
export * from './lib/catalog/departments'
export * from './lib/catalog/courses'
export * from './lib/catalog/lecturers'
export * from './lib/catalog/students'
export * from './lib/reports/student-report'
export * from './lib/reports/sink'
export * from './lib/reports/bulk'
export * from './lib/store/types'
export { InMemorySchedulingStore } from './lib/store/memory'
export { SupabaseSchedulingStore, createSupabaseSchedulingStore } from './lib/store/supabase'
export type { SupabaseStoreOptions } from './lib/store/supabase'
export { loadConfig, getConfig } from './lib/env'
export type { AppConfig } from './lib/env'
export type { Actor, ActorRole } from './lib/authz'
export * from './actions/action-state'
export * from './actions/class-sessions'
export * from './actions/enrollment'
export * from './actions/catalog'
