import { lockKey, type SchedulingStore } from '@/lib/store/types'

import { DeleteConflictError } from './errors'
import { requireEntity } from './lookups'

// Deletion rules. Department, course, lecturer and class session deletes are
// refused while dependents exist; a student delete instead clears the
// student's enrollments first. A course with any class session is protected
// even when nobody is enrolled, while a class session only blocks on enrolled
// students. Both asymmetries are intended policy.

export async function deleteDepartment(store: SchedulingStore, departmentId: string) {
  await store.transaction({ locks: [lockKey('department', departmentId)], label: 'deleteDepartment' }, async (tx) => {
    const department = await requireEntity(tx.departments, 'department', departmentId)
    const filter = { departmentId: department.id }

    if ((await tx.students.count(filter)) > 0) {
      throw new DeleteConflictError('department', department.id, 'Cannot delete department with students')
    }

    if ((await tx.lecturers.count(filter)) > 0) {
      throw new DeleteConflictError('department', department.id, 'Cannot delete department with lecturers')
    }

    if ((await tx.courses.count(filter)) > 0) {
      throw new DeleteConflictError('department', department.id, 'Cannot delete department with courses')
    }

    await tx.departments.delete(department.id)
  })

  console.log('[scheduling] department deleted', { departmentId })
}

export async function deleteCourse(store: SchedulingStore, courseId: string) {
  await store.transaction({ locks: [lockKey('course', courseId)], label: 'deleteCourse' }, async (tx) => {
    const course = await requireEntity(tx.courses, 'course', courseId)

    if ((await tx.classSessions.count({ courseId: course.id })) > 0) {
      throw new DeleteConflictError(
        'course',
        course.id,
        `Cannot delete course ${course.name} because class sessions are assigned to it`
      )
    }

    const assignments = await tx.assignments.findAll({ courseId: course.id })

    for (const assignment of assignments) {
      await tx.assignments.remove(assignment)
    }

    await tx.courses.delete(course.id)
  })

  console.log('[scheduling] course deleted', { courseId })
}

export async function deleteLecturer(store: SchedulingStore, lecturerId: string) {
  await store.transaction({ locks: [lockKey('lecturer', lecturerId)], label: 'deleteLecturer' }, async (tx) => {
    const lecturer = await requireEntity(tx.lecturers, 'lecturer', lecturerId)

    if ((await tx.classSessions.count({ lecturerId: lecturer.id })) > 0) {
      throw new DeleteConflictError(
        'lecturer',
        lecturer.id,
        `Cannot delete lecturer ${lecturer.name} because they are assigned to class sessions`
      )
    }

    const assignments = await tx.assignments.findAll({ lecturerId: lecturer.id })

    for (const assignment of assignments) {
      await tx.assignments.remove(assignment)
    }

    await tx.lecturers.delete(lecturer.id)
  })

  console.log('[scheduling] lecturer deleted', { lecturerId })
}

export async function deleteClassSession(store: SchedulingStore, classSessionId: string) {
  await store.transaction(
    { locks: [lockKey('classSession', classSessionId)], label: 'deleteClassSession' },
    async (tx) => {
      const session = await requireEntity(tx.classSessions, 'classSession', classSessionId)

      if ((await tx.enrollments.count({ classSessionId: session.id })) > 0) {
        throw new DeleteConflictError(
          'classSession',
          session.id,
          `Cannot delete class with ID: ${session.id} because students are enrolled in the class`
        )
      }

      await tx.classSessions.delete(session.id)
    }
  )

  console.log('[scheduling] class session deleted', { classSessionId })
}

export async function deleteStudent(store: SchedulingStore, studentId: string) {
  const removedEnrollments = await store.transaction(
    { locks: [lockKey('student', studentId)], label: 'deleteStudent' },
    async (tx) => {
      const student = await requireEntity(tx.students, 'student', studentId)
      const enrollments = await tx.enrollments.findAll({ studentId: student.id })

      for (const enrollment of enrollments) {
        await tx.enrollments.remove(enrollment)
      }

      await tx.students.delete(student.id)
      return enrollments.length
    }
  )

  console.log('[scheduling] student deleted', { studentId, removedEnrollments })
}
