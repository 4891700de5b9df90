import { DAYS_OF_WEEK, type DayOfWeek, type TimeSlot } from '@/types/scheduling'

import { InvalidArgsError } from './errors'

const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(00))?$/

export function isDayOfWeek(value: string): value is DayOfWeek {
  return DAYS_OF_WEEK.some((day) => day === value)
}

/** Minutes since midnight for an `HH:mm` (or Postgres `HH:mm:00`) label. */
export function toMinutes(timeLabel: string): number {
  const match = timeLabel.trim().match(TIME_PATTERN)

  if (!match) {
    throw new InvalidArgsError(`Invalid time format: ${timeLabel}`, 'time')
  }

  const hours = Number(match[1])
  const minutes = Number(match[2])

  if (hours > 23 || minutes > 59) {
    throw new InvalidArgsError(`Invalid time of day: ${timeLabel}`, 'time')
  }

  return hours * 60 + minutes
}

export function formatMinutes(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60)
  const minutes = totalMinutes % 60
  return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}`
}

export function createTimeSlot(day: string, startTime: string, endTime: string): TimeSlot {
  const normalizedDay = day.trim().toUpperCase()

  if (!isDayOfWeek(normalizedDay)) {
    throw new InvalidArgsError(`Invalid day of week: ${day}`, 'day')
  }

  const start = toMinutes(startTime)
  const end = toMinutes(endTime)

  if (end <= start) {
    throw new InvalidArgsError('End time must be after start time', 'endTime')
  }

  return {
    day: normalizedDay,
    startTime: formatMinutes(start),
    endTime: formatMinutes(end),
  }
}

/**
 * Same day and intersecting ranges. Strict on both ends, so a slot ending at
 * 10:30 and one starting at 10:30 do not overlap.
 */
export function overlaps(a: TimeSlot, b: TimeSlot): boolean {
  if (a.day !== b.day) {
    return false
  }

  return toMinutes(a.startTime) < toMinutes(b.endTime) && toMinutes(b.startTime) < toMinutes(a.endTime)
}

export function sameTimeSlot(a: TimeSlot, b: TimeSlot): boolean {
  return a.day === b.day && toMinutes(a.startTime) === toMinutes(b.startTime) && toMinutes(a.endTime) === toMinutes(b.endTime)
}

export function timeSlotKey(slot: TimeSlot): string {
  return `${slot.day}@${formatMinutes(toMinutes(slot.startTime))}-${formatMinutes(toMinutes(slot.endTime))}`
}

export function findOverlapping<T extends { timeSlot: TimeSlot }>(candidate: TimeSlot, items: T[]): T[] {
  return items.filter((item) => overlaps(item.timeSlot, candidate))
}

export function formatTimeSlot(slot: TimeSlot): string {
  return `${slot.day} ${slot.startTime}-${slot.endTime}`
}
