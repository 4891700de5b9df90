import type { Department, Page, PageRequest } from '@/types/scheduling'
import { lockKey, type SchedulingStore } from '@/lib/store/types'
import { NotFoundError } from '@/lib/scheduling/errors'
import { requireEntity } from '@/lib/scheduling/lookups'

export interface CreateDepartmentInput {
  name: string
  code: string
}

export type UpdateDepartmentInput = Partial<CreateDepartmentInput>

export async function createDepartment(store: SchedulingStore, input: CreateDepartmentInput): Promise<Department> {
  const department = await store.transaction({ locks: [], label: 'createDepartment' }, async (tx) =>
    tx.departments.save({
      id: await tx.nextExternalId('department'),
      name: input.name.trim(),
      code: input.code.trim(),
    })
  )

  console.log('[catalog] department created', { id: department.id })
  return department
}

export async function getDepartment(store: SchedulingStore, departmentId: string) {
  return store.transaction({ locks: [], label: 'getDepartment' }, (tx) =>
    requireEntity(tx.departments, 'department', departmentId)
  )
}

export async function getDepartmentByName(store: SchedulingStore, name: string) {
  const department = await store.transaction({ locks: [], label: 'getDepartmentByName' }, (tx) =>
    tx.departments.findByName(name)
  )

  if (!department) {
    throw new NotFoundError('department', name, `Department with name: ${name} not found`)
  }

  return department
}

export async function listDepartments(store: SchedulingStore, request: PageRequest): Promise<Page<Department>> {
  return store.transaction({ locks: [], label: 'listDepartments' }, (tx) => tx.departments.list(request))
}

export async function countDepartments(store: SchedulingStore) {
  return store.transaction({ locks: [], label: 'countDepartments' }, (tx) => tx.departments.count())
}

export async function updateDepartment(
  store: SchedulingStore,
  departmentId: string,
  input: UpdateDepartmentInput
): Promise<Department> {
  return store.transaction({ locks: [lockKey('department', departmentId)], label: 'updateDepartment' }, async (tx) => {
    const department = await requireEntity(tx.departments, 'department', departmentId)

    return tx.departments.save({
      ...department,
      name: input.name?.trim() ?? department.name,
      code: input.code?.trim() ?? department.code,
    })
  })
}
