import { makeCollectorError, CollectorErrorCode } from './errors.js'
import type { DateRange } from './types.js'

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const DAY_MS = 24 * 60 * 60 * 1000

export function epochToIso(seconds: number): string {
  return new Date(seconds * 1000).toISOString()
}

/** Parses `YYYY-MM-DD` as midnight UTC. */
export function parseDay(value: string): Date {
  const match = DAY_PATTERN.exec(value)
  if (match) {
    const [, year, month, day] = match
    const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)))
    if (parsed.toISOString().slice(0, 10) === value) return parsed
  }
  throw makeCollectorError(
    CollectorErrorCode.INVALID_ARGUMENT,
    `Invalid date "${value}", expected YYYY-MM-DD`
  )
}

export function getDateRange(start: string, end: string): [Date, Date] {
  const from = parseDay(start)
  const to = parseDay(end)
  if (from.getTime() > to.getTime()) {
    throw makeCollectorError(
      CollectorErrorCode.INVALID_ARGUMENT,
      `Date range starts after it ends: ${start} > ${end}`
    )
  }
  return [from, to]
}

// `to` is a whole day: anything before the following midnight is inside.
export function isWithinRange(seconds: number, range: DateRange): boolean {
  const ms = seconds * 1000
  if (range.from && ms < range.from.getTime()) return false
  if (range.to && ms >= range.to.getTime() + DAY_MS) return false
  return true
}
