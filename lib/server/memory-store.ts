import { randomUUID } from 'crypto'
import type { StoredTimeSeriesPoint, VISnapshot } from '../types/api'
import { timeSeriesKey, type SnapshotStore, type TimeSeriesStore } from './store'

export function createMemoryTimeSeriesStore(seed: readonly StoredTimeSeriesPoint[] = []): TimeSeriesStore & {
  all(): StoredTimeSeriesPoint[]
} {
  const rows = new Map<string, StoredTimeSeriesPoint>()
  for (const point of seed) rows.set(timeSeriesKey(point), { ...point })

  return {
    async findInRange(fieldId, viType, startDate, endDate) {
      return [...rows.values()]
        .filter((row) => row.fieldId === fieldId && row.viType === viType && row.date >= startDate && row.date <= endDate)
        .sort((a, b) => a.date.localeCompare(b.date))
        .map((row) => ({ ...row }))
    },
    async insertMissing(points) {
      let written = 0
      for (const point of points) {
        const key = timeSeriesKey(point)
        if (rows.has(key)) continue
        rows.set(key, { ...point })
        written += 1
      }
      return written
    },
    all() {
      return [...rows.values()].map((row) => ({ ...row }))
    },
  }
}

export function createMemorySnapshotStore(): SnapshotStore & { all(): VISnapshot[] } {
  const rows: VISnapshot[] = []

  const newestFirst = (a: VISnapshot, b: VISnapshot) => b.snapshotDate.localeCompare(a.snapshotDate)

  return {
    async existsOnDay(fieldId, viType, dateKey) {
      return rows.some((row) => row.fieldId === fieldId && row.viType === viType && row.snapshotDate.slice(0, 10) === dateKey)
    },
    async insert(snapshot) {
      const stored: VISnapshot = { id: randomUUID(), ...snapshot }
      rows.push(stored)
      return { ...stored }
    },
    async listRecent(fieldId, query) {
      return rows
        .filter((row) => row.fieldId === fieldId && (!query.viType || row.viType === query.viType))
        .sort(newestFirst)
        .slice(0, Math.max(0, query.limit))
        .map((row) => ({ ...row }))
    },
    async latest(fieldId, viType) {
      const [first] = rows.filter((row) => row.fieldId === fieldId && row.viType === viType).sort(newestFirst)
      return first ? { ...first } : null
    },
    all() {
      return rows.map((row) => ({ ...row }))
    },
  }
}
