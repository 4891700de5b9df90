import { format } from 'date-fns'

import type { ClassSessionView, ReportFormat, Student, StudentReport } from '@/types/scheduling'
import { DAYS_OF_WEEK } from '@/types/scheduling'
import type { SchedulingStore } from '@/lib/store/types'
import { NotFoundError } from '@/lib/scheduling/errors'
import { requireEntity, sessionsOfStudent, toClassSessionView } from '@/lib/scheduling/lookups'
import { toMinutes } from '@/lib/scheduling/time-slot'

import type { ReportSink } from './sink'

const GENERATED_AT_PATTERN = 'yyyy-MM-dd HH:mm:ss'
const FILE_TIMESTAMP_PATTERN = 'yyyyMMdd_HHmmss'

interface StudentReportData {
  student: Student
  departmentName: string
  sessions: ClassSessionView[]
}

export function escapeCsv(value: string) {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

export function buildReportFileName(studentId: string, reportFormat: ReportFormat, now: Date) {
  return `student_report_${studentId}_${format(now, FILE_TIMESTAMP_PATTERN)}.${reportFormat}`
}

function compareSessions(a: ClassSessionView, b: ClassSessionView) {
  const dayDiff = DAYS_OF_WEEK.indexOf(a.timeSlot.day) - DAYS_OF_WEEK.indexOf(b.timeSlot.day)
  return dayDiff || toMinutes(a.timeSlot.startTime) - toMinutes(b.timeSlot.startTime) || a.id.localeCompare(b.id)
}

function timeRange(session: ClassSessionView) {
  return `${session.timeSlot.startTime}-${session.timeSlot.endTime}`
}

export function renderTxtReport({ student, departmentName, sessions }: StudentReportData, now: Date) {
  const lines = [
    'STUDENT REPORT',
    `Generated: ${format(now, GENERATED_AT_PATTERN)}`,
    '==============',
    '',
    'Student Details:',
    '---------------',
    `ID: ${student.id}`,
    `Name: ${student.name}`,
    `Email: ${student.email}`,
    `Phone: ${student.phone}`,
    `Enrollment Year: ${student.enrollmentYear}`,
    `Department: ${departmentName}`,
    '',
    'Enrolled Classes:',
    '----------------',
  ]

  if (sessions.length === 0) {
    lines.push('No classes enrolled.')
  }

  for (const session of sessions) {
    lines.push(
      '',
      `- ${session.courseName} (${session.timeSlot.day} ${timeRange(session)}) - ${session.location} - ` +
        `Taught by: ${session.lecturerName} - Seats: ${session.enrolledCount}/${session.maxCapacity}`
    )
  }

  return `${lines.join('\n')}\n`
}

export function renderCsvReport({ student, departmentName, sessions }: StudentReportData, now: Date) {
  const lines = [
    `Generated,${format(now, GENERATED_AT_PATTERN)}`,
    'Student ID,Name,Email,Phone,Enrollment Year,Department',
    [
      escapeCsv(student.id),
      escapeCsv(student.name),
      escapeCsv(student.email),
      escapeCsv(student.phone),
      String(student.enrollmentYear),
      escapeCsv(departmentName),
    ].join(','),
    '',
    'Course,Day,Time,Location,Lecturer,Enrollment',
    ...sessions.map((session) =>
      [
        escapeCsv(session.courseName),
        session.timeSlot.day,
        timeRange(session),
        escapeCsv(session.location),
        escapeCsv(session.lecturerName),
        `${session.enrolledCount}/${session.maxCapacity}`,
      ].join(',')
    ),
  ]

  return `${lines.join('\n')}\n`
}

async function loadReportData(store: SchedulingStore, studentId: string): Promise<StudentReportData> {
  return store.transaction({ locks: [], label: 'loadReportData' }, async (tx) => {
    const student = await requireEntity(tx.students, 'student', studentId)
    const department = await tx.departments.findById(student.departmentId)

    if (!department) {
      throw new NotFoundError('department', student.departmentId)
    }

    const sessions = await sessionsOfStudent(tx, student.id)
    const views = await Promise.all(sessions.map((session) => toClassSessionView(tx, session)))

    return { student, departmentName: department.name, sessions: views.sort(compareSessions) }
  })
}

/**
 * Renders a student's schedule without persisting it. The report reflects the
 * committed state at the moment it is read.
 */
export async function buildStudentReport(
  store: SchedulingStore,
  studentId: string,
  reportFormat: ReportFormat,
  now: Date = new Date()
): Promise<StudentReport> {
  const data = await loadReportData(store, studentId)
  const content = reportFormat === 'csv' ? renderCsvReport(data, now) : renderTxtReport(data, now)

  return {
    studentId: data.student.id,
    studentName: data.student.name,
    format: reportFormat,
    fileName: buildReportFileName(data.student.id, reportFormat, now),
    content,
    fileSize: Buffer.byteLength(content, 'utf8'),
  }
}

export async function generateStudentReport(
  store: SchedulingStore,
  sink: ReportSink,
  studentId: string,
  reportFormat: ReportFormat,
  now: Date = new Date()
): Promise<StudentReport> {
  console.log('[reports] generating student report', { studentId, format: reportFormat })

  const report = await buildStudentReport(store, studentId, reportFormat, now)
  await sink.write(report.fileName, report.content)

  console.log('[reports] student report stored', { studentId, fileName: report.fileName, fileSize: report.fileSize })
  return report
}
