import { PNG } from 'pngjs'
import { describe, expect, it } from 'vitest'
import { DataUnavailableError, ServiceUnavailableError, UnsupportedVITypeError } from '../server/errors'
import { silentLogger } from '../server/log'
import { createFakeCompute, TEST_FIELD, type FakeScene } from '../testing/fake-compute'
import type { GeoComputePort } from './compute'
import { generateOverlay, getStatistics, type AnalysisContext } from './statistics'

function context(compute: GeoComputePort, locale: AnalysisContext['locale'] = 'th'): AnalysisContext {
  return { compute, logger: silentLogger, locale }
}

const JUNE_SCENE: FakeScene = { id: 'S2_20240614', acquiredAt: '2024-06-14T03:00:00Z' }

describe('getStatistics', () => {
  it('reduces the newest scene around the requested date', async () => {
    const compute = createFakeCompute([{ id: 'S2_20240610', acquiredAt: '2024-06-10T03:00:00Z', dn: { nir: 6000 } }, JUNE_SCENE])
    const stats = await getStatistics(context(compute), TEST_FIELD, 'NDVI', '2024-06-15')

    expect(stats.meanValue).toBeCloseTo(0.428571, 5)
    expect(stats.minValue).toBeCloseTo(0.428571, 5)
    expect(stats.maxValue).toBeCloseTo(0.428571, 5)
    expect(stats.analysisMessage).toBe('ต้นข้าวเขียวปานกลาง - ใบใบเริ่มหนาแน่น')
    expect(stats.measurementDate).toBe('2024-06-15T00:00:00.000Z')
    expect(stats.acquiredAt).toBe('2024-06-14T03:00:00.000Z')
    expect(compute.queries).toEqual([
      { bbox: [100.5, 14, 100.51, 14.01], startDate: '2024-06-08', endDate: '2024-06-22', maxCloudCover: 30 },
    ])
  })

  it('localises the analysis message', async () => {
    const compute = createFakeCompute([JUNE_SCENE])
    const stats = await getStatistics(context(compute, 'en'), TEST_FIELD, 'NDVI', '2024-06-15')
    expect(stats.analysisMessage).toBe('Moderately green rice - canopy thickening')
  })

  it('falls back to the trailing year when the window is empty', async () => {
    const compute = createFakeCompute([{ acquiredAt: '2024-03-01T03:00:00Z' }])
    const stats = await getStatistics(context(compute), TEST_FIELD, 'NDVI', '2024-06-15')

    expect(stats.acquiredAt).toBe('2024-03-01T03:00:00.000Z')
    expect(compute.queries.map((query) => [query.startDate, query.endDate])).toEqual([
      ['2024-06-08', '2024-06-22'],
      ['2023-06-23', '2024-06-22'],
    ])
  })

  it('fails with no_suitable_images when nothing is found', async () => {
    const compute = createFakeCompute([])
    await expect(getStatistics(context(compute), TEST_FIELD, 'NDVI', '2024-06-15')).rejects.toMatchObject({
      name: 'DataUnavailableError',
      reason: 'no_suitable_images',
    })
  })

  it('fails when every pixel is cloud-masked', async () => {
    const compute = createFakeCompute([{ acquiredAt: '2024-06-14T03:00:00Z', dn: { qa: 1024 } }])
    await expect(getStatistics(context(compute), TEST_FIELD, 'NDVI', '2024-06-15')).rejects.toMatchObject({
      reason: 'no_statistics_returned',
    })
  })

  it('treats an exact zero mean as missing data except for NDWI', async () => {
    const flat = createFakeCompute([{ acquiredAt: '2024-06-14T03:00:00Z', dn: { nir: 3000, red: 3000, green: 3000 } }])

    await expect(getStatistics(context(flat), TEST_FIELD, 'NDVI', '2024-06-15')).rejects.toMatchObject({
      reason: 'zero_mean_detected',
    })

    const ndwi = await getStatistics(context(flat), TEST_FIELD, 'NDWI', '2024-06-15')
    expect(ndwi.meanValue).toBe(0)
    expect(ndwi.analysisMessage).toBe('ชื้นน้อย - เริ่มขาดน้ำ')
  })

  it('rejects unsupported index types before querying', async () => {
    const compute = createFakeCompute([JUNE_SCENE])
    await expect(getStatistics(context(compute), TEST_FIELD, 'LAI', '2024-06-15')).rejects.toBeInstanceOf(
      UnsupportedVITypeError
    )
    expect(compute.queries).toHaveLength(0)
  })

  it('rejects a missing geometry as unavailable data', async () => {
    const compute = createFakeCompute([JUNE_SCENE])
    await expect(getStatistics(context(compute), null, 'NDVI', '2024-06-15')).rejects.toBeInstanceOf(
      DataUnavailableError
    )
  })
})

describe('generateOverlay', () => {
  it('returns a 512 px PNG clipped to the field', async () => {
    const compute = createFakeCompute([JUNE_SCENE])
    const overlay = await generateOverlay(context(compute), TEST_FIELD, 'NDVI', '2024-06-15')

    expect(overlay.startsWith('data:image/png;base64,')).toBe(true)
    const png = PNG.sync.read(Buffer.from(overlay.slice('data:image/png;base64,'.length), 'base64'))
    expect(png.width).toBe(512)
    expect(png.height).toBe(512)
    expect(png.data[3]).toBe(255)
  })

  it('returns an empty string when no scene exists', async () => {
    const compute = createFakeCompute([])
    await expect(generateOverlay(context(compute), TEST_FIELD, 'NDVI', '2024-06-15')).resolves.toBe('')
  })

  it('returns an empty string when rendering fails', async () => {
    const compute = createFakeCompute([JUNE_SCENE], { renderFails: true })
    await expect(generateOverlay(context(compute), TEST_FIELD, 'NDVI', '2024-06-15')).resolves.toBe('')
  })

  it('propagates an unavailable compute service', async () => {
    const compute = createFakeCompute([JUNE_SCENE])
    const failing: GeoComputePort = {
      ...compute,
      async filterCollection() {
        throw new ServiceUnavailableError('remote_http_401:example.test')
      },
    }
    await expect(generateOverlay(context(failing), TEST_FIELD, 'NDVI', '2024-06-15')).rejects.toBeInstanceOf(
      ServiceUnavailableError
    )
  })

  it('propagates unsupported index types', async () => {
    const compute = createFakeCompute([JUNE_SCENE])
    await expect(generateOverlay(context(compute), TEST_FIELD, 'LAI', '2024-06-15')).rejects.toBeInstanceOf(
      UnsupportedVITypeError
    )
  })
})
