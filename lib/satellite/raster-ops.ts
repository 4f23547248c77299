import { rasterizeRegion, type RegionOfInterest } from '../server/geometry'
import type { RegionStats, SingleBandRaster } from './compute'

/** Mean/min/max over unmasked pixels whose centres fall inside the region. */
export function reduceRegionLocal(raster: SingleBandRaster, region: RegionOfInterest): RegionStats {
  const { width, height, values, mask } = raster
  const inside = rasterizeRegion(region, raster.bbox, width, height)

  let min = Number.POSITIVE_INFINITY
  let max = Number.NEGATIVE_INFINITY
  let sum = 0
  let count = 0

  for (let i = 0; i < width * height; i++) {
    if (!inside[i] || !mask[i]) continue
    const value = values[i]
    if (!Number.isFinite(value)) continue
    sum += value
    count += 1
    if (value < min) min = value
    if (value > max) max = value
  }

  if (!count) return { mean: null, min: null, max: null, pixelCount: 0 }
  return { mean: sum / count, min, max, pixelCount: count }
}
