import { DataUnavailableError } from '../server/errors'

export type DateInput = Date | string

const DAY_MS = 24 * 60 * 60 * 1000
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/

/** Date-only strings are read as UTC midnight so day arithmetic never crosses a timezone. */
export function toUtcDate(input: DateInput): Date {
  const date = input instanceof Date
    ? new Date(input.getTime())
    : new Date(DATE_ONLY.test(input) ? `${input}T00:00:00Z` : input)
  if (Number.isNaN(date.getTime())) throw new DataUnavailableError(`invalid_date:${String(input)}`)
  return date
}

export function toDateKey(date: Date) {
  return date.toISOString().slice(0, 10)
}

export function addDays(date: Date, days: number) {
  return new Date(date.getTime() + days * DAY_MS)
}

export function dayIndex(date: Date) {
  return Math.floor(date.getTime() / DAY_MS)
}

export function startOfMonth(date: Date) {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1))
}

export function addMonths(date: Date, months: number) {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + months, 1))
}

export function startOfYear(date: Date) {
  return new Date(Date.UTC(date.getUTCFullYear(), 0, 1))
}

export function addYears(date: Date, years: number) {
  return new Date(Date.UTC(date.getUTCFullYear() + years, 0, 1))
}
