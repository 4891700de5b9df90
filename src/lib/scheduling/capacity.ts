import { InvalidArgsError } from './errors'

export const MIN_SESSION_CAPACITY = 1
export const MAX_SESSION_CAPACITY = 500

export interface SeatCount {
  maxCapacity: number
  enrolledCount: number
}

export function availableSeats({ maxCapacity, enrolledCount }: SeatCount): number {
  return maxCapacity - enrolledCount
}

export function isFull({ maxCapacity, enrolledCount }: SeatCount): boolean {
  return enrolledCount >= maxCapacity
}

export function ensureValidCapacity(maxCapacity: number) {
  if (
    !Number.isInteger(maxCapacity) ||
    maxCapacity < MIN_SESSION_CAPACITY ||
    maxCapacity > MAX_SESSION_CAPACITY
  ) {
    throw new InvalidArgsError(
      `Max capacity must be a whole number between ${MIN_SESSION_CAPACITY} and ${MAX_SESSION_CAPACITY}`,
      'maxCapacity'
    )
  }
}
