import type { TimeSeriesPoint } from '../types/api'

export const FULL_YEAR_MIN_MONTHS = 6
export const TEN_YEAR_MIN_YEARS = 5

type DatedPoint = Pick<TimeSeriesPoint, 'date'>

function parseUtc(value: string | Date) {
  const date = value instanceof Date ? value : new Date(/^\d{4}-\d{2}-\d{2}$/.test(value) ? `${value}T00:00:00Z` : value)
  return Number.isNaN(date.getTime()) ? null : date
}

function distinct(points: readonly DatedPoint[], key: (date: Date) => number) {
  const keys = new Set<number>()
  for (const point of points) {
    const date = parseUtc(point.date)
    if (date) keys.add(key(date))
  }
  return keys.size
}

export function expectedMonthCount(requestedStart: Date, requestedEnd: Date) {
  const startMonth = requestedStart.getUTCMonth() + 1
  const endMonth = requestedEnd.getUTCMonth() + 1
  return endMonth >= startMonth ? Math.max(1, endMonth - startMonth + 1) : 1
}

/**
 * Whether stored points already answer the request. Months are month-of-year and
 * ignore the year they fall in. Never throws: unreadable input counts as incomplete.
 */
export function isCacheComplete(
  storedPoints: readonly DatedPoint[],
  analysisType: string | null | undefined,
  requestedStart: string | Date,
  requestedEnd: string | Date
): boolean {
  if (!storedPoints.length) return false

  switch (analysisType) {
    case 'full_year':
      return distinct(storedPoints, (date) => date.getUTCMonth()) >= FULL_YEAR_MIN_MONTHS
    case 'monthly_range': {
      const start = parseUtc(requestedStart)
      const end = parseUtc(requestedEnd)
      if (!start || !end) return false
      return distinct(storedPoints, (date) => date.getUTCMonth()) >= expectedMonthCount(start, end)
    }
    case 'ten_year_avg':
      return distinct(storedPoints, (date) => date.getUTCFullYear()) >= TEN_YEAR_MIN_YEARS
    default:
      return true
  }
}
