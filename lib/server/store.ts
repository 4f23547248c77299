import type { NewVISnapshot, StoredTimeSeriesPoint, VISnapshot, VIType } from '../types/api'

export type SnapshotQuery = {
  viType?: VIType
  limit: number
}

/** Rows are unique on (fieldId, viType, date). */
export interface TimeSeriesStore {
  /** Points with `startDate <= date <= endDate` (YYYY-MM-DD), oldest first. */
  findInRange(fieldId: string, viType: VIType, startDate: string, endDate: string): Promise<StoredTimeSeriesPoint[]>
  /** Writes points whose key is not stored yet and returns how many were written. */
  insertMissing(points: readonly StoredTimeSeriesPoint[]): Promise<number>
}

export interface SnapshotStore {
  existsOnDay(fieldId: string, viType: VIType, dateKey: string): Promise<boolean>
  insert(snapshot: NewVISnapshot): Promise<VISnapshot>
  /** Newest first. */
  listRecent(fieldId: string, query: SnapshotQuery): Promise<VISnapshot[]>
  latest(fieldId: string, viType: VIType): Promise<VISnapshot | null>
}

export function timeSeriesKey(point: Pick<StoredTimeSeriesPoint, 'fieldId' | 'viType' | 'date'>) {
  return `${point.fieldId}|${point.viType}|${point.date}`
}
