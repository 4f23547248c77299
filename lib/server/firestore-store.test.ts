import { describe, expect, it } from 'vitest'
import { createFakeFirestore } from '../testing/fake-firestore'
import { createFirestoreSnapshotStore, createFirestoreTimeSeriesStore } from './firestore-store'

const SERIES = 'fields/field-1/vi_timeseries'
const SNAPSHOTS = 'fields/field-1/vi_snapshots'

function snapshotDoc(viType: string, snapshotDate: string, meanValue: unknown) {
  return { viType, snapshotDate, meanValue, minValue: 0.1, maxValue: 0.9, overlayData: '', analysisMessage: snapshotDate }
}

describe('firestore time-series store', () => {
  it('keys points by type and date and skips ones already stored', async () => {
    const fake = createFakeFirestore()
    const store = createFirestoreTimeSeriesStore(fake.db)
    const point = { fieldId: 'field-1', viType: 'NDVI' as const, date: '2024-02-01', value: 0.5 }

    expect(await store.insertMissing([point, { ...point, date: '2024-03-01' }])).toBe(2)
    expect(await store.insertMissing([{ ...point, value: 0.9 }, { ...point, viType: 'EVI' }])).toBe(1)

    const docs = fake.docs(SERIES)
    expect(Object.keys(docs).sort()).toEqual(['EVI_2024-02-01', 'NDVI_2024-02-01', 'NDVI_2024-03-01'])
    expect(docs['NDVI_2024-02-01']).toMatchObject({ viType: 'NDVI', measurementDate: '2024-02-01', value: 0.5 })
  })

  it('propagates write failures other than an existing document', async () => {
    const denied = Object.assign(new Error('7 PERMISSION_DENIED'), { code: 7 })
    const fake = createFakeFirestore({
      createFailure: (path) => (path.endsWith('/NDVI_2024-03-01') ? denied : undefined),
    })
    const store = createFirestoreTimeSeriesStore(fake.db)
    const point = { fieldId: 'field-1', viType: 'NDVI' as const, date: '2024-02-01', value: 0.5 }

    await expect(store.insertMissing([point, { ...point, date: '2024-03-01' }])).rejects.toBe(denied)
    expect(Object.keys(fake.docs(SERIES))).toEqual(['NDVI_2024-02-01'])
  })

  it('reads an inclusive range oldest first and drops unreadable rows', async () => {
    const fake = createFakeFirestore()
    fake.seed(SERIES, 'NDVI_2024-03-31', { viType: 'NDVI', measurementDate: '2024-03-31', value: 0.6 })
    fake.seed(SERIES, 'NDVI_2024-01-01', { viType: 'NDVI', measurementDate: '2024-01-01', value: 0.3 })
    fake.seed(SERIES, 'NDVI_2024-02-01', { viType: 'NDVI', measurementDate: '2024-02-01', value: 'n/a' })
    fake.seed(SERIES, 'NDVI_2024-04-01', { viType: 'NDVI', measurementDate: '2024-04-01', value: 0.7 })
    fake.seed(SERIES, 'EVI_2024-01-01', { viType: 'EVI', measurementDate: '2024-01-01', value: 0.2 })

    const store = createFirestoreTimeSeriesStore(fake.db)
    const stored = await store.findInRange('field-1', 'NDVI', '2024-01-01', '2024-03-31')
    expect(stored).toEqual([
      { fieldId: 'field-1', viType: 'NDVI', date: '2024-01-01', value: 0.3 },
      { fieldId: 'field-1', viType: 'NDVI', date: '2024-03-31', value: 0.6 },
    ])
  })
})

describe('firestore snapshot store', () => {
  it('checks for a snapshot within the UTC calendar day', async () => {
    const fake = createFakeFirestore()
    fake.seed(SNAPSHOTS, 'late', snapshotDoc('NDVI', '2024-06-01T23:59:59.000Z', 0.5))
    const store = createFirestoreSnapshotStore(fake.db)

    expect(await store.existsOnDay('field-1', 'NDVI', '2024-06-01')).toBe(true)
    expect(await store.existsOnDay('field-1', 'NDVI', '2024-06-02')).toBe(false)
    expect(await store.existsOnDay('field-1', 'EVI', '2024-06-01')).toBe(false)
  })

  it('returns the generated id on insert', async () => {
    const fake = createFakeFirestore()
    const store = createFirestoreSnapshotStore(fake.db)
    const stored = await store.insert({
      fieldId: 'field-1',
      viType: 'NDVI',
      snapshotDate: '2024-06-01T03:00:00.000Z',
      meanValue: 0.5,
      minValue: 0.4,
      maxValue: 0.6,
      overlayData: '',
      analysisMessage: 'test',
    })
    expect(stored.id).toBe('auto-1')
    expect(fake.docs(SNAPSHOTS)['auto-1']).toMatchObject({ viType: 'NDVI', meanValue: 0.5 })
  })

  it('lists newest first, skips rows without a mean and honours the limit', async () => {
    const fake = createFakeFirestore()
    fake.seed(SNAPSHOTS, 'a', snapshotDoc('NDVI', '2024-06-01T03:00:00.000Z', 0.3))
    fake.seed(SNAPSHOTS, 'b', snapshotDoc('NDVI', '2024-06-05T03:00:00.000Z', null))
    fake.seed(SNAPSHOTS, 'c', snapshotDoc('EVI', '2024-06-03T03:00:00.000Z', 0.4))
    const store = createFirestoreSnapshotStore(fake.db)

    expect((await store.listRecent('field-1', { limit: 10 })).map((row) => row.id)).toEqual(['c', 'a'])
    expect((await store.listRecent('field-1', { viType: 'EVI', limit: 1 })).map((row) => row.id)).toEqual(['c'])

    const queriesBefore = fake.queries.length
    expect(await store.listRecent('field-1', { limit: 0 })).toEqual([])
    expect(fake.queries).toHaveLength(queriesBefore)
  })

  it('falls back to the mean when min or max is missing', async () => {
    const fake = createFakeFirestore()
    fake.seed(SNAPSHOTS, 'a', { viType: 'NDVI', snapshotDate: '2024-06-01T03:00:00.000Z', meanValue: 0.42 })
    const store = createFirestoreSnapshotStore(fake.db)

    expect(await store.latest('field-1', 'NDVI')).toEqual({
      id: 'a',
      fieldId: 'field-1',
      viType: 'NDVI',
      snapshotDate: '2024-06-01T03:00:00.000Z',
      meanValue: 0.42,
      minValue: 0.42,
      maxValue: 0.42,
      overlayData: '',
      analysisMessage: '',
    })
    expect(await store.latest('field-1', 'SAVI')).toBeNull()
  })
})
