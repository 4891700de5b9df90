import type { z } from 'zod'

import { ensureAdminActor } from '@/lib/authz'
import { createCourse, updateCourse } from '@/lib/catalog/courses'
import { createDepartment, updateDepartment } from '@/lib/catalog/departments'
import {
  assignLecturerToCourse,
  createLecturer,
  unassignLecturerFromCourse,
  updateLecturer,
} from '@/lib/catalog/lecturers'
import { createStudent, updateStudent } from '@/lib/catalog/students'
import { deleteCourse, deleteDepartment, deleteLecturer, deleteStudent } from '@/lib/scheduling/integrity'
import {
  courseAssignmentSchema,
  createCourseSchema,
  createDepartmentSchema,
  createLecturerSchema,
  createStudentSchema,
  entityIdSchema,
  updateCourseSchema,
  updateDepartmentSchema,
  updateLecturerSchema,
  updateStudentSchema,
} from '@/lib/validation/catalog'
import type { Course, CourseAssignment, Department, Lecturer, Student } from '@/types/scheduling'

import {
  makeForbiddenState,
  makeSuccessState,
  makeValidationErrorState,
  toErrorState,
  type ActionContext,
  type ActionState,
} from './action-state'

interface AdminActionOptions<S extends z.ZodTypeAny, T> {
  label: string
  schema: S
  forbiddenMessage: string
  run: (context: ActionContext, input: z.output<S>) => Promise<{ message: string; data: T }>
}

async function runAdminAction<S extends z.ZodTypeAny, T>(
  context: ActionContext,
  payload: unknown,
  options: AdminActionOptions<S, T>
): Promise<ActionState<T>> {
  if (!ensureAdminActor(context.actor)) {
    return makeForbiddenState(options.forbiddenMessage)
  }

  const parsed = options.schema.safeParse(payload)

  if (!parsed.success) {
    return makeValidationErrorState(parsed.error.flatten().fieldErrors)
  }

  try {
    const { message, data } = await options.run(context, parsed.data)
    return makeSuccessState(message, data)
  } catch (error) {
    return toErrorState(options.label, error)
  }
}

export function createDepartmentAction(context: ActionContext, payload: unknown): Promise<ActionState<Department>> {
  return runAdminAction(context, payload, {
    label: 'createDepartmentAction',
    schema: createDepartmentSchema,
    forbiddenMessage: 'You are not allowed to create departments.',
    run: async ({ store }, input) => {
      const department = await createDepartment(store, input)
      return { message: `Department ${department.id} created.`, data: department }
    },
  })
}

export function updateDepartmentAction(context: ActionContext, payload: unknown): Promise<ActionState<Department>> {
  return runAdminAction(context, payload, {
    label: 'updateDepartmentAction',
    schema: updateDepartmentSchema,
    forbiddenMessage: 'You are not allowed to update departments.',
    run: async ({ store }, { departmentId, ...changes }) => {
      const department = await updateDepartment(store, departmentId, changes)
      return { message: `Department ${department.id} updated.`, data: department }
    },
  })
}

export function deleteDepartmentAction(context: ActionContext, payload: unknown): Promise<ActionState<string>> {
  return runAdminAction(context, payload, {
    label: 'deleteDepartmentAction',
    schema: entityIdSchema,
    forbiddenMessage: 'You are not allowed to delete departments.',
    run: async ({ store }, { id }) => {
      await deleteDepartment(store, id)
      return { message: `Department ${id} deleted.`, data: id }
    },
  })
}

export function createCourseAction(context: ActionContext, payload: unknown): Promise<ActionState<Course>> {
  return runAdminAction(context, payload, {
    label: 'createCourseAction',
    schema: createCourseSchema,
    forbiddenMessage: 'You are not allowed to create courses.',
    run: async ({ store }, input) => {
      const course = await createCourse(store, input)
      return { message: `Course ${course.id} created.`, data: course }
    },
  })
}

export function updateCourseAction(context: ActionContext, payload: unknown): Promise<ActionState<Course>> {
  return runAdminAction(context, payload, {
    label: 'updateCourseAction',
    schema: updateCourseSchema,
    forbiddenMessage: 'You are not allowed to update courses.',
    run: async ({ store }, { courseId, ...changes }) => {
      const course = await updateCourse(store, courseId, changes)
      return { message: `Course ${course.id} updated.`, data: course }
    },
  })
}

export function deleteCourseAction(context: ActionContext, payload: unknown): Promise<ActionState<string>> {
  return runAdminAction(context, payload, {
    label: 'deleteCourseAction',
    schema: entityIdSchema,
    forbiddenMessage: 'You are not allowed to delete courses.',
    run: async ({ store }, { id }) => {
      await deleteCourse(store, id)
      return { message: `Course ${id} deleted.`, data: id }
    },
  })
}

export function createLecturerAction(context: ActionContext, payload: unknown): Promise<ActionState<Lecturer>> {
  return runAdminAction(context, payload, {
    label: 'createLecturerAction',
    schema: createLecturerSchema,
    forbiddenMessage: 'You are not allowed to create lecturers.',
    run: async ({ store }, input) => {
      const lecturer = await createLecturer(store, input)
      return { message: `Lecturer ${lecturer.id} created.`, data: lecturer }
    },
  })
}

export function updateLecturerAction(context: ActionContext, payload: unknown): Promise<ActionState<Lecturer>> {
  return runAdminAction(context, payload, {
    label: 'updateLecturerAction',
    schema: updateLecturerSchema,
    forbiddenMessage: 'You are not allowed to update lecturers.',
    run: async ({ store }, { lecturerId, ...changes }) => {
      const lecturer = await updateLecturer(store, lecturerId, changes)
      return { message: `Lecturer ${lecturer.id} updated.`, data: lecturer }
    },
  })
}

export function deleteLecturerAction(context: ActionContext, payload: unknown): Promise<ActionState<string>> {
  return runAdminAction(context, payload, {
    label: 'deleteLecturerAction',
    schema: entityIdSchema,
    forbiddenMessage: 'You are not allowed to delete lecturers.',
    run: async ({ store }, { id }) => {
      await deleteLecturer(store, id)
      return { message: `Lecturer ${id} deleted.`, data: id }
    },
  })
}

export function assignLecturerAction(context: ActionContext, payload: unknown): Promise<ActionState<CourseAssignment>> {
  return runAdminAction(context, payload, {
    label: 'assignLecturerAction',
    schema: courseAssignmentSchema,
    forbiddenMessage: 'You are not allowed to assign lecturers.',
    run: async ({ store }, assignment) => {
      await assignLecturerToCourse(store, assignment.lecturerId, assignment.courseId)
      return { message: `Lecturer ${assignment.lecturerId} assigned to ${assignment.courseId}.`, data: assignment }
    },
  })
}

export function unassignLecturerAction(
  context: ActionContext,
  payload: unknown
): Promise<ActionState<CourseAssignment>> {
  return runAdminAction(context, payload, {
    label: 'unassignLecturerAction',
    schema: courseAssignmentSchema,
    forbiddenMessage: 'You are not allowed to unassign lecturers.',
    run: async ({ store }, assignment) => {
      await unassignLecturerFromCourse(store, assignment.lecturerId, assignment.courseId)
      return { message: `Lecturer ${assignment.lecturerId} unassigned from ${assignment.courseId}.`, data: assignment }
    },
  })
}

export function createStudentAction(context: ActionContext, payload: unknown): Promise<ActionState<Student>> {
  return runAdminAction(context, payload, {
    label: 'createStudentAction',
    schema: createStudentSchema,
    forbiddenMessage: 'You are not allowed to create students.',
    run: async ({ store }, input) => {
      const student = await createStudent(store, input)
      return { message: `Student ${student.id} created.`, data: student }
    },
  })
}

export function updateStudentAction(context: ActionContext, payload: unknown): Promise<ActionState<Student>> {
  return runAdminAction(context, payload, {
    label: 'updateStudentAction',
    schema: updateStudentSchema,
    forbiddenMessage: 'You are not allowed to update students.',
    run: async ({ store }, { studentId, ...changes }) => {
      const student = await updateStudent(store, studentId, changes)
      return { message: `Student ${student.id} updated.`, data: student }
    },
  })
}

export function deleteStudentAction(context: ActionContext, payload: unknown): Promise<ActionState<string>> {
  return runAdminAction(context, payload, {
    label: 'deleteStudentAction',
    schema: entityIdSchema,
    forbiddenMessage: 'You are not allowed to delete students.',
    run: async ({ store }, { id }) => {
      await deleteStudent(store, id)
      return { message: `Student ${id} deleted.`, data: id }
    },
  })
}
