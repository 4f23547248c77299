import type { BBox } from '../types/api'
import type { RegionOfInterest } from '../server/geometry'
import type { SpectralBand } from './bands'

export type CollectionQuery = {
  bbox: BBox
  /** Inclusive, YYYY-MM-DD. */
  startDate: string
  /** Exclusive, YYYY-MM-DD. */
  endDate: string
  maxCloudCover: number
}

/** Raw digital numbers for one scene, cropped to the query bbox. */
export type RawBands = {
  width: number
  height: number
  bbox: BBox
  bands: Partial<Record<SpectralBand, Float32Array>>
}

export type RemoteScene = {
  id: string
  acquiredAt: Date
  cloudPercentage: number
  readBands(bands: readonly SpectralBand[]): Promise<RawBands>
}

export type SingleBandRaster = {
  width: number
  height: number
  bbox: BBox
  values: Float32Array
  mask: Uint8Array
}

export type RegionStats = {
  mean: number | null
  min: number | null
  max: number | null
  pixelCount: number
}

export type ColorRamp = {
  min: number
  max: number
  palette: readonly string[]
}

export type ThumbnailRequest = {
  region: RegionOfInterest
  ramp: ColorRamp
  dimensions: number
  /** Used by providers that can render the same index server-side. */
  expression?: string
  sceneIds?: readonly string[]
}

export type ThumbnailResult = {
  png: Buffer | null
  url: string | null
}

/**
 * Capabilities the pipeline needs from the remote geospatial service. Every call is
 * an awaited, failable network round trip from the caller's point of view.
 */
export interface GeoComputePort {
  filterCollection(query: CollectionQuery): Promise<RemoteScene[]>
  reduceRegion(raster: SingleBandRaster, region: RegionOfInterest): Promise<RegionStats>
  renderThumbnail(raster: SingleBandRaster, request: ThumbnailRequest): Promise<ThumbnailResult>
}
