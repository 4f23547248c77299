import type { DocumentData, OrderByDirection, WhereFilterOp } from 'firebase-admin/firestore'
import { VI_TYPES, type NewVISnapshot, type StoredTimeSeriesPoint, type VISnapshot, type VIType } from '../types/api'
import type { SnapshotStore, TimeSeriesStore } from './store'

const FIELDS = 'fields'
const TIMESERIES = 'vi_timeseries'
const SNAPSHOTS = 'vi_snapshots'

// gRPC ALREADY_EXISTS
const ALREADY_EXISTS = 6

function isAlreadyExists(error: unknown) {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === ALREADY_EXISTS
}

export type QuerySnapshotLike = {
  empty: boolean
  docs: Array<{ id: string; data(): DocumentData }>
}

export type QueryLike = {
  where(field: string, op: WhereFilterOp, value: unknown): QueryLike
  orderBy(field: string, direction?: OrderByDirection): QueryLike
  limit(count: number): QueryLike
  get(): Promise<QuerySnapshotLike>
}

export type CollectionLike = QueryLike & {
  doc(id: string): DocumentLike
  add(data: DocumentData): Promise<{ id: string }>
}

export type DocumentLike = {
  collection(name: string): CollectionLike
  create(data: DocumentData): Promise<unknown>
}

/** The part of the Admin SDK `Firestore` the stores touch. */
export type FirestoreLike = {
  collection(name: string): CollectionLike
}

// Rows with a missing or corrupt number are skipped rather than read as 0.
function toNumber(value: unknown) {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

function toViType(value: unknown): VIType | null {
  return VI_TYPES.find((type) => type === value) ?? null
}

function toPoint(fieldId: string, data: DocumentData): StoredTimeSeriesPoint | null {
  const viType = toViType(data.viType)
  const value = toNumber(data.value)
  if (!viType || value === null || typeof data.measurementDate !== 'string') return null
  return { fieldId, viType, date: data.measurementDate, value }
}

function toSnapshot(id: string, fieldId: string, data: DocumentData): VISnapshot | null {
  const viType = toViType(data.viType)
  const meanValue = toNumber(data.meanValue)
  if (!viType || meanValue === null || typeof data.snapshotDate !== 'string') return null
  return {
    id,
    fieldId,
    viType,
    snapshotDate: data.snapshotDate,
    meanValue,
    minValue: toNumber(data.minValue) ?? meanValue,
    maxValue: toNumber(data.maxValue) ?? meanValue,
    overlayData: String(data.overlayData ?? ''),
    analysisMessage: String(data.analysisMessage ?? ''),
  }
}

function isPresent<T>(value: T | null): value is T {
  return value !== null
}

export function createFirestoreTimeSeriesStore(db: FirestoreLike): TimeSeriesStore {
  const series = (fieldId: string) => db.collection(FIELDS).doc(fieldId).collection(TIMESERIES)

  return {
    async findInRange(fieldId, viType, startDate, endDate) {
      const qs = await series(fieldId)
        .where('viType', '==', viType)
        .where('measurementDate', '>=', startDate)
        .where('measurementDate', '<=', endDate)
        .orderBy('measurementDate', 'asc')
        .get()
      return qs.docs.map((doc) => toPoint(fieldId, doc.data())).filter(isPresent)
    },
    async insertMissing(points) {
      let written = 0
      for (const point of points) {
        // Doc id is the uniqueness key; create() rejects an existing one.
        const ref = series(point.fieldId).doc(`${point.viType}_${point.date}`)
        try {
          await ref.create({
            viType: point.viType,
            measurementDate: point.date,
            value: point.value,
            createdAt: new Date().toISOString(),
          })
          written += 1
        } catch (error) {
          if (!isAlreadyExists(error)) throw error
        }
      }
      return written
    },
  }
}

export function createFirestoreSnapshotStore(db: FirestoreLike): SnapshotStore {
  const snapshots = (fieldId: string) => db.collection(FIELDS).doc(fieldId).collection(SNAPSHOTS)

  return {
    async existsOnDay(fieldId, viType, dateKey) {
      const qs = await snapshots(fieldId)
        .where('viType', '==', viType)
        .where('snapshotDate', '>=', `${dateKey}T00:00:00.000Z`)
        .where('snapshotDate', '<=', `${dateKey}T23:59:59.999Z`)
        .limit(1)
        .get()
      return !qs.empty
    },
    async insert(snapshot: NewVISnapshot) {
      const ref = await snapshots(snapshot.fieldId).add({ ...snapshot, createdAt: new Date().toISOString() })
      return { id: ref.id, ...snapshot }
    },
    async listRecent(fieldId, query) {
      if (query.limit <= 0) return []
      let q: QueryLike = snapshots(fieldId).orderBy('snapshotDate', 'desc')
      if (query.viType) q = q.where('viType', '==', query.viType)
      const qs = await q.limit(query.limit).get()
      return qs.docs.map((doc) => toSnapshot(doc.id, fieldId, doc.data())).filter(isPresent)
    },
    async latest(fieldId, viType) {
      const qs = await snapshots(fieldId)
        .where('viType', '==', viType)
        .orderBy('snapshotDate', 'desc')
        .limit(1)
        .get()
      const [doc] = qs.docs
      return doc ? toSnapshot(doc.id, fieldId, doc.data()) : null
    },
  }
}
