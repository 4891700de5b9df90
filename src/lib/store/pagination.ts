import type { Page, PageRequest } from '@/types/scheduling'
import { InvalidArgsError } from '@/lib/scheduling/errors'

export const DEFAULT_PAGE_SIZE = 20

export function ensureValidPageRequest(request: PageRequest) {
  if (!Number.isInteger(request.page) || request.page < 0) {
    throw new InvalidArgsError('Page number must be >= 0', 'page')
  }

  if (!Number.isInteger(request.size) || request.size <= 0) {
    throw new InvalidArgsError('Page size must be > 0', 'size')
  }
}

export function buildPage<T>(items: T[], request: PageRequest, totalItems: number): Page<T> {
  return {
    items,
    page: request.page,
    size: request.size,
    totalItems,
    totalPages: totalItems === 0 ? 0 : Math.ceil(totalItems / request.size),
  }
}

export function pageRange(request: PageRequest) {
  const from = request.page * request.size
  return { from, to: from + request.size - 1 }
}
