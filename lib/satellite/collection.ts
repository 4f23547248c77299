import type { BBox } from '../types/api'
import { DataUnavailableError } from '../server/errors'
import { parseFieldGeometry, type RegionOfInterest } from '../server/geometry'
import type { Logger } from '../server/log'
import { REFLECTANCE_SCALE, isMaskedByQa, type ReflectanceBand } from './bands'
import type { GeoComputePort, RawBands, RemoteScene } from './compute'
import { addDays, toDateKey, toUtcDate, type DateInput } from './dates'

export const MAX_CLOUD_COVER = 30
export const FALLBACK_WINDOW_DAYS = 365

export type SpectralImage = {
  id: string
  acquiredAt: Date
  cloudPercentage: number
  width: number
  height: number
  bbox: BBox
  /** Scaled surface reflectance; masked pixels keep their values but have mask 0. */
  bands: Partial<Record<ReflectanceBand, Float32Array>>
  mask: Uint8Array
}

export type SpectralScene = {
  id: string
  acquiredAt: Date
  cloudPercentage: number
  load(bands: readonly ReflectanceBand[]): Promise<SpectralImage>
}

export class ImageCollection {
  readonly scenes: readonly SpectralScene[]

  constructor(scenes: readonly SpectralScene[]) {
    this.scenes = [...scenes].sort((a, b) => a.acquiredAt.getTime() - b.acquiredAt.getTime())
  }

  get size() {
    return this.scenes.length
  }

  isEmpty() {
    return this.scenes.length === 0
  }

  /** Start inclusive, end exclusive. */
  filterDate(start: Date, end: Date) {
    const from = start.getTime()
    const to = end.getTime()
    return new ImageCollection(
      this.scenes.filter((scene) => scene.acquiredAt.getTime() >= from && scene.acquiredAt.getTime() < to)
    )
  }

  newestFirst() {
    return [...this.scenes].reverse()
  }

  latest(): SpectralScene | null {
    return this.scenes.length ? this.scenes[this.scenes.length - 1] : null
  }
}

export type CollectionResult = {
  collection: ImageCollection
  region: RegionOfInterest
  startDate: string
  endDate: string
  widened: boolean
}

export function maskAndScale(
  scene: RemoteScene,
  raw: RawBands,
  bands: readonly ReflectanceBand[]
): SpectralImage {
  const pixelCount = raw.width * raw.height
  const mask = new Uint8Array(pixelCount).fill(1)
  const qa = raw.bands.qa

  if (qa) {
    for (let i = 0; i < pixelCount; i++) {
      if (isMaskedByQa(qa[i])) mask[i] = 0
    }
  }

  const scaled: Partial<Record<ReflectanceBand, Float32Array>> = {}
  for (const band of bands) {
    const values = raw.bands[band]
    if (!values) continue
    if (values.length !== pixelCount) throw new DataUnavailableError(`band_size_mismatch:${scene.id}:${band}`)
    const reflectance = new Float32Array(pixelCount)
    for (let i = 0; i < pixelCount; i++) {
      const dn = values[i]
      // 0 is the product's no-data value.
      if (dn === 0 || !Number.isFinite(dn)) mask[i] = 0
      reflectance[i] = dn * REFLECTANCE_SCALE
    }
    scaled[band] = reflectance
  }

  return {
    id: scene.id,
    acquiredAt: scene.acquiredAt,
    cloudPercentage: scene.cloudPercentage,
    width: raw.width,
    height: raw.height,
    bbox: raw.bbox,
    bands: scaled,
    mask,
  }
}

function toSpectralScene(scene: RemoteScene): SpectralScene {
  return {
    id: scene.id,
    acquiredAt: scene.acquiredAt,
    cloudPercentage: scene.cloudPercentage,
    async load(bands) {
      const raw = await scene.readBands([...bands, 'qa'])
      return maskAndScale(scene, raw, bands)
    },
  }
}

async function queryCollection(port: GeoComputePort, region: RegionOfInterest, startDate: string, endDate: string) {
  const scenes = await port.filterCollection({
    bbox: region.bbox,
    startDate,
    endDate,
    maxCloudCover: MAX_CLOUD_COVER,
  })
  return new ImageCollection(
    scenes.filter((scene) => scene.cloudPercentage < MAX_CLOUD_COVER).map(toSpectralScene)
  )
}

/**
 * Cloud-filtered, masked scenes over the field for [startDate, endDate). An empty
 * window is widened once to the 365 days ending at `endDate`; an empty result after
 * that is returned as-is for the caller to treat as "no data".
 */
export async function getCollection(
  port: GeoComputePort,
  geometry: unknown,
  startDate: DateInput,
  endDate: DateInput,
  logger?: Logger
): Promise<CollectionResult> {
  const region = parseFieldGeometry(geometry)
  const start = toDateKey(toUtcDate(startDate))
  const end = toDateKey(toUtcDate(endDate))

  const collection = await queryCollection(port, region, start, end)
  logger?.info('collection_filtered', { startDate: start, endDate: end, size: collection.size })
  if (!collection.isEmpty()) {
    return { collection, region, startDate: start, endDate: end, widened: false }
  }

  const widenedStart = toDateKey(addDays(toUtcDate(end), -FALLBACK_WINDOW_DAYS))
  const widened = await queryCollection(port, region, widenedStart, end)
  logger?.info('collection_widened', { startDate: widenedStart, endDate: end, size: widened.size })
  return { collection: widened, region, startDate: widenedStart, endDate: end, widened: true }
}
