import type { BulkReportSummary, ReportFormat, StudentReport } from '@/types/scheduling'
import { getConfig } from '@/lib/env'
import type { SchedulingStore } from '@/lib/store/types'

import type { ReportSink } from './sink'
import { generateStudentReport } from './student-report'

export interface BulkReportOptions {
  concurrency?: number
  now?: () => Date
}

/**
 * Runs `worker` over `items` with at most `limit` calls in flight. Results keep
 * the input order; a rejected call never stops the others.
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = []
  let cursor = 0

  const runners = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (cursor < items.length) {
      const index = cursor
      cursor += 1

      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index]) }
      } catch (reason) {
        results[index] = { status: 'rejected', reason }
      }
    }
  })

  await Promise.all(runners)
  return results
}

export async function generateBulkReports(
  store: SchedulingStore,
  sink: ReportSink,
  studentIds: readonly string[],
  reportFormat: ReportFormat,
  options: BulkReportOptions = {}
): Promise<BulkReportSummary> {
  const concurrency = options.concurrency ?? getConfig().REPORT_CONCURRENCY
  const now = options.now ?? (() => new Date())

  console.log('[reports] bulk generation started', { total: studentIds.length, concurrency, format: reportFormat })

  const settled = await runPool(studentIds, concurrency, (studentId) =>
    generateStudentReport(store, sink, studentId, reportFormat, now())
  )

  const reports: StudentReport[] = []

  settled.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      reports.push(result.value)
      return
    }

    console.error('[reports] student report failed', { studentId: studentIds[index], error: result.reason })
  })

  const summary: BulkReportSummary = {
    totalRequests: studentIds.length,
    successfulGenerations: reports.length,
    failedGenerations: studentIds.length - reports.length,
    generatedAt: now().toISOString(),
    fileNames: reports.map((report) => report.fileName),
  }

  console.log('[reports] bulk generation completed', {
    successful: summary.successfulGenerations,
    total: summary.totalRequests,
  })

  return summary
}
