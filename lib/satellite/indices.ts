import { VI_TYPES, type BBox, type VIType } from '../types/api'
import { InvalidImageError, UnsupportedVITypeError } from '../server/errors'
import type { ReflectanceBand } from './bands'
import type { SpectralImage } from './collection'
import type { SingleBandRaster } from './compute'

type PixelBands = Record<ReflectanceBand, number>

export type VIFormula = {
  type: VIType
  bands: readonly ReflectanceBand[]
  /** Server-side band-math equivalent, in Sentinel-2 asset names. */
  expression: string
  compute(px: PixelBands): number
}

export type VIRaster = SingleBandRaster & {
  viType: VIType
  sceneIds: string[]
  acquiredAt: Date
}

function normalizedDifference(a: number, b: number) {
  return (a - b) / (a + b)
}

export const VI_FORMULAS: Record<VIType, VIFormula> = {
  NDVI: {
    type: 'NDVI',
    bands: ['nir', 'red'],
    expression: '(B08-B04)/(B08+B04)',
    compute: ({ nir, red }) => normalizedDifference(nir, red),
  },
  EVI: {
    type: 'EVI',
    bands: ['nir', 'red', 'blue'],
    expression: '2.5*(B08-B04)/(B08+6*B04-7.5*B02+1)',
    compute: ({ nir, red, blue }) => (2.5 * (nir - red)) / (nir + 6 * red - 7.5 * blue + 1),
  },
  GNDVI: {
    type: 'GNDVI',
    bands: ['nir', 'green'],
    expression: '(B08-B03)/(B08+B03)',
    compute: ({ nir, green }) => normalizedDifference(nir, green),
  },
  NDWI: {
    type: 'NDWI',
    bands: ['green', 'nir'],
    expression: '(B03-B08)/(B03+B08)',
    compute: ({ green, nir }) => normalizedDifference(green, nir),
  },
  SAVI: {
    type: 'SAVI',
    bands: ['nir', 'red'],
    expression: '((B08-B04)/(B08+B04+0.5))*1.5',
    compute: ({ nir, red }) => ((nir - red) / (nir + red + 0.5)) * 1.5,
  },
  VCI: {
    type: 'VCI',
    bands: ['nir', 'red'],
    expression: '((B08-B04)/(B08+B04))*100',
    compute: ({ nir, red }) => normalizedDifference(nir, red) * 100,
  },
}

export function isVIType(value: unknown): value is VIType {
  return typeof value === 'string' && (VI_TYPES as readonly string[]).includes(value)
}

export function getVIFormula(viType: string): VIFormula {
  if (!isVIType(viType)) throw new UnsupportedVITypeError(viType)
  return VI_FORMULAS[viType]
}

/**
 * Applies a VI formula per pixel. Masked inputs and non-finite results (zero
 * denominators) come out masked with a NaN value.
 */
export function computeVI(image: SpectralImage, viType: string): VIRaster {
  const formula = getVIFormula(viType)
  const missing = formula.bands.filter((band) => !image.bands[band])
  if (missing.length) throw new InvalidImageError(missing)

  const pixelCount = image.width * image.height
  const values = new Float32Array(pixelCount)
  const mask = new Uint8Array(pixelCount)
  const px: PixelBands = { blue: 0, green: 0, red: 0, nir: 0, swir1: 0, swir2: 0 }

  for (let i = 0; i < pixelCount; i++) {
    if (!image.mask[i]) {
      values[i] = Number.NaN
      continue
    }
    for (const band of formula.bands) {
      px[band] = image.bands[band]?.[i] ?? Number.NaN
    }
    const value = formula.compute(px)
    if (Number.isFinite(value)) {
      values[i] = value
      mask[i] = 1
    } else {
      values[i] = Number.NaN
    }
  }

  return {
    viType: formula.type,
    sceneIds: [image.id],
    acquiredAt: image.acquiredAt,
    width: image.width,
    height: image.height,
    bbox: image.bbox,
    values,
    mask,
  }
}

function sameGrid(a: { width: number; height: number; bbox: BBox }, b: { width: number; height: number; bbox: BBox }) {
  return a.width === b.width && a.height === b.height && a.bbox.every((value, index) => value === b.bbox[index])
}

/** Per-pixel mean across rasters of one VI type; each pixel averages only its unmasked inputs. */
export function meanComposite(rasters: readonly VIRaster[]): VIRaster {
  if (!rasters.length) throw new Error('composite_requires_rasters')
  const [first] = rasters
  for (const raster of rasters) {
    if (raster.viType !== first.viType) throw new Error('composite_mixed_vi_types')
    if (!sameGrid(raster, first)) throw new InvalidImageError(['grid_mismatch'])
  }

  const pixelCount = first.width * first.height
  const values = new Float32Array(pixelCount)
  const mask = new Uint8Array(pixelCount)

  for (let i = 0; i < pixelCount; i++) {
    let sum = 0
    let count = 0
    for (const raster of rasters) {
      if (!raster.mask[i]) continue
      sum += raster.values[i]
      count += 1
    }
    if (count) {
      values[i] = sum / count
      mask[i] = 1
    } else {
      values[i] = Number.NaN
    }
  }

  const latest = rasters.reduce((acc, raster) => (raster.acquiredAt > acc ? raster.acquiredAt : acc), first.acquiredAt)
  return {
    viType: first.viType,
    sceneIds: rasters.flatMap((raster) => raster.sceneIds),
    acquiredAt: latest,
    width: first.width,
    height: first.height,
    bbox: first.bbox,
    values,
    mask,
  }
}
