export const DAYS_OF_WEEK = [
  'MONDAY',
  'TUESDAY',
  'WEDNESDAY',
  'THURSDAY',
  'FRIDAY',
  'SATURDAY',
  'SUNDAY',
] as const

export type DayOfWeek = (typeof DAYS_OF_WEEK)[number]

export interface TimeSlot {
  day: DayOfWeek
  /** `HH:mm`, 24h */
  startTime: string
  /** `HH:mm`, 24h, strictly after `startTime` */
  endTime: string
}

export interface Department {
  id: string
  name: string
  code: string
}

export interface Course {
  id: string
  name: string
  code: string
  departmentId: string
}

export interface Lecturer {
  id: string
  name: string
  email: string
  phone: string
  departmentId: string
}

export interface Student {
  id: string
  name: string
  email: string
  phone: string
  departmentId: string
  enrollmentYear: number
}

export interface ClassSession {
  id: string
  courseId: string
  lecturerId: string
  timeSlot: TimeSlot
  location: string
  maxCapacity: number
}

export interface CourseAssignment {
  lecturerId: string
  courseId: string
}

export interface Enrollment {
  studentId: string
  classSessionId: string
}

export interface ClassSessionView extends ClassSession {
  courseName: string
  lecturerName: string
  enrolledCount: number
  availableSeats: number
  isFull: boolean
  studentIds: string[]
}

export interface EnrollmentResult {
  studentId: string
  classSessionId: string
  studentName: string
  courseName: string
  availableSeats: number
}

export interface PageRequest {
  page: number
  size: number
  sortBy?: string
}

export interface Page<T> {
  items: T[]
  page: number
  size: number
  totalItems: number
  totalPages: number
}

export type ReportFormat = 'txt' | 'csv'

export interface StudentReport {
  studentId: string
  studentName: string
  format: ReportFormat
  fileName: string
  content: string
  fileSize: number
}

export interface BulkReportSummary {
  totalRequests: number
  successfulGenerations: number
  failedGenerations: number
  generatedAt: string
  fileNames: string[]
}
