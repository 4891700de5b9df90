import type { Course, Page, PageRequest } from '@/types/scheduling'
import { lockKey, type SchedulingStore } from '@/lib/store/types'
import { NotFoundError } from '@/lib/scheduling/errors'
import { requireEntity } from '@/lib/scheduling/lookups'

export interface CreateCourseInput {
  name: string
  code: string
  departmentId: string
}

export type UpdateCourseInput = Partial<Pick<CreateCourseInput, 'name' | 'code'>>

export async function createCourse(store: SchedulingStore, input: CreateCourseInput): Promise<Course> {
  const course = await store.transaction(
    { locks: [lockKey('department', input.departmentId)], label: 'createCourse' },
    async (tx) => {
      const department = await requireEntity(tx.departments, 'department', input.departmentId)

      return tx.courses.save({
        id: await tx.nextExternalId('course'),
        name: input.name.trim(),
        code: input.code.trim(),
        departmentId: department.id,
      })
    }
  )

  console.log('[catalog] course created', { id: course.id, departmentId: course.departmentId })
  return course
}

export async function getCourse(store: SchedulingStore, courseId: string) {
  return store.transaction({ locks: [], label: 'getCourse' }, (tx) => requireEntity(tx.courses, 'course', courseId))
}

export async function getCourseByName(store: SchedulingStore, name: string) {
  const course = await store.transaction({ locks: [], label: 'getCourseByName' }, (tx) => tx.courses.findByName(name))

  if (!course) {
    throw new NotFoundError('course', name, `Course with name: ${name} not found`)
  }

  return course
}

export async function listCourses(
  store: SchedulingStore,
  request: PageRequest,
  departmentId?: string
): Promise<Page<Course>> {
  return store.transaction({ locks: [], label: 'listCourses' }, async (tx) => {
    if (departmentId === undefined) {
      return tx.courses.list(request)
    }

    await requireEntity(tx.departments, 'department', departmentId)
    return tx.courses.list({ ...request, sortBy: request.sortBy ?? 'name' }, { departmentId })
  })
}

export async function countCourses(store: SchedulingStore) {
  return store.transaction({ locks: [], label: 'countCourses' }, (tx) => tx.courses.count())
}

export async function updateCourse(store: SchedulingStore, courseId: string, input: UpdateCourseInput): Promise<Course> {
  return store.transaction({ locks: [lockKey('course', courseId)], label: 'updateCourse' }, async (tx) => {
    const course = await requireEntity(tx.courses, 'course', courseId)

    return tx.courses.save({
      ...course,
      name: input.name?.trim() ?? course.name,
      code: input.code?.trim() ?? course.code,
    })
  })
}
