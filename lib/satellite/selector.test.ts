import { describe, expect, it } from 'vitest'
import { ServiceUnavailableError } from '../server/errors'
import { silentLogger } from '../server/log'
import { createFakeCompute, TEST_FIELD } from '../testing/fake-compute'
import type { GeoComputePort, RemoteScene } from './compute'
import { selectDiverseObservations } from './selector'
import type { AnalysisContext } from './statistics'

const NOW = '2024-06-01T00:00:00Z'

function context(compute: GeoComputePort): AnalysisContext {
  return { compute, logger: silentLogger, locale: 'th' }
}

describe('selectDiverseObservations', () => {
  it('keeps observations at least five calendar days apart, newest first', async () => {
    const compute = createFakeCompute([
      { id: 'd0', acquiredAt: '2024-05-01T03:30:00Z' },
      { id: 'd1', acquiredAt: '2024-05-02T03:30:00Z' },
      { id: 'd2', acquiredAt: '2024-05-03T03:30:00Z' },
      { id: 'd6-early', acquiredAt: '2024-05-07T03:00:00Z' },
      { id: 'd6-late', acquiredAt: '2024-05-07T10:00:00Z' },
    ])

    const observations = await selectDiverseObservations(context(compute), TEST_FIELD, 'NDVI', 4, NOW)

    expect(observations.map((observation) => observation.acquiredAt)).toEqual([
      '2024-05-07T10:00:00.000Z',
      '2024-05-02T03:30:00.000Z',
    ])
    expect(observations[0].meanValue).toBeCloseTo(0.428571, 5)
    expect(observations[0].overlayUrl.startsWith('data:image/png;base64,')).toBe(true)
    expect(observations[0].analysisMessage).toBe('ต้นข้าวเขียวปานกลาง - ใบใบเริ่มหนาแน่น')
    expect(compute.reads).toEqual(['d6-late', 'd1'])
  })

  it('searches the trailing 180 days', async () => {
    const compute = createFakeCompute([{ acquiredAt: '2024-05-20T03:00:00Z' }])
    await selectDiverseObservations(context(compute), TEST_FIELD, 'NDVI', 4, NOW)
    expect(compute.queries[0]).toMatchObject({ startDate: '2023-12-04', endDate: '2024-06-01' })
  })

  it('stops at the requested limit', async () => {
    const compute = createFakeCompute([
      { acquiredAt: '2024-04-01T03:00:00Z' },
      { acquiredAt: '2024-04-11T03:00:00Z' },
      { acquiredAt: '2024-04-21T03:00:00Z' },
      { acquiredAt: '2024-05-01T03:00:00Z' },
    ])
    const observations = await selectDiverseObservations(context(compute), TEST_FIELD, 'NDVI', 2, NOW)
    expect(observations.map((observation) => observation.acquiredAt.slice(0, 10))).toEqual(['2024-05-01', '2024-04-21'])
  })

  it('skips candidates with a zero mean or a failed read', async () => {
    const compute = createFakeCompute([
      { id: 'good', acquiredAt: '2024-04-01T03:00:00Z' },
      { id: 'flat', acquiredAt: '2024-04-15T03:00:00Z', dn: { nir: 3000, red: 3000 } },
      { id: 'broken', acquiredAt: '2024-05-01T03:00:00Z', failRead: true },
    ])
    const observations = await selectDiverseObservations(context(compute), TEST_FIELD, 'NDVI', 4, NOW)
    expect(observations.map((observation) => observation.acquiredAt.slice(0, 10))).toEqual(['2024-04-01'])
    expect(compute.reads).toEqual(['broken', 'flat', 'good'])
  })

  it('skips candidates whose overlay cannot be rendered', async () => {
    const compute = createFakeCompute([{ acquiredAt: '2024-05-01T03:00:00Z' }], { renderFails: true })
    await expect(selectDiverseObservations(context(compute), TEST_FIELD, 'NDVI', 4, NOW)).resolves.toEqual([])
  })

  it('never tries more than five candidates per requested observation', async () => {
    const compute = createFakeCompute([
      { id: 'oldest', acquiredAt: '2024-01-01T03:00:00Z' },
      ...[2, 3, 4, 5, 6].map((month) => ({
        id: `broken-${month}`,
        acquiredAt: `2024-0${month}-01T03:00:00Z`,
        failRead: true,
      })),
    ])
    const observations = await selectDiverseObservations(context(compute), TEST_FIELD, 'NDVI', 1, '2024-06-20T00:00:00Z')
    expect(observations).toEqual([])
    expect(compute.reads).toEqual(['broken-6', 'broken-5', 'broken-4', 'broken-3', 'broken-2'])
  })

  it('returns nothing when no imagery exists', async () => {
    const compute = createFakeCompute([])
    await expect(selectDiverseObservations(context(compute), TEST_FIELD, 'NDVI', 4, NOW)).resolves.toEqual([])
    expect(compute.queries).toHaveLength(2)
  })

  it('propagates an unavailable compute service', async () => {
    const compute = createFakeCompute([])
    const failing: GeoComputePort = {
      ...compute,
      async filterCollection(): Promise<RemoteScene[]> {
        return [
          {
            id: 'unreachable',
            acquiredAt: new Date('2024-05-01T03:00:00Z'),
            cloudPercentage: 1,
            async readBands() {
              throw new ServiceUnavailableError('remote_unreachable:example.test')
            },
          },
        ]
      },
    }
    await expect(selectDiverseObservations(context(failing), TEST_FIELD, 'NDVI', 4, NOW)).rejects.toBeInstanceOf(
      ServiceUnavailableError
    )
  })
})
