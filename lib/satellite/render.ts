import { PNG } from 'pngjs'
import type { VIType } from '../types/api'
import { rasterizeRegion } from '../server/geometry'
import { fetchBinaryWithRetry } from '../server/provider-runtime'
import type { ColorRamp, SingleBandRaster, ThumbnailRequest } from './compute'

type RGB = [number, number, number]

const GREENING_PALETTE = ['#8b0000', '#ff4500', '#ffff00', '#9acd32', '#00ff00', '#228b22', '#006400']

export const VIS_PARAMS: Record<VIType, ColorRamp> = {
  NDVI: { min: -0.2, max: 0.8, palette: ['#ff0000', '#ff4500', '#ffff00', '#9acd32', '#00ff00', '#228b22', '#006400'] },
  EVI: { min: -0.1, max: 0.7, palette: GREENING_PALETTE },
  GNDVI: { min: 0, max: 0.8, palette: GREENING_PALETTE },
  NDWI: { min: -0.3, max: 0.5, palette: ['#8b4513', '#daa520', '#ffff99', '#87ceeb', '#4169e1', '#000080'] },
  SAVI: { min: -0.1, max: 0.7, palette: GREENING_PALETTE },
  VCI: { min: 0, max: 100, palette: GREENING_PALETTE },
}

export function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(max, value))
}

function lerp(start: number, end: number, t: number) {
  return start + (end - start) * t
}

export function hexToRgb(hex: string): RGB {
  const match = /^#?([0-9a-f]{6})$/i.exec(hex.trim())
  if (!match) throw new Error(`invalid_palette_color:${hex}`)
  const value = parseInt(match[1], 16)
  return [(value >> 16) & 255, (value >> 8) & 255, value & 255]
}

/** Linear interpolation across evenly spaced palette stops, clamped to the ramp domain. */
export function createRampSampler(ramp: ColorRamp): (value: number) => RGB {
  const colors = ramp.palette.map(hexToRgb)
  if (!colors.length) throw new Error('empty_palette')
  const span = Math.max(1e-9, ramp.max - ramp.min)

  return (value) => {
    if (colors.length === 1) return colors[0]
    const normalized = clamp((value - ramp.min) / span, 0, 1)
    const position = normalized * (colors.length - 1)
    const lower = Math.floor(position)
    const upper = Math.min(colors.length - 1, lower + 1)
    const t = position - lower
    return [
      Math.round(lerp(colors[lower][0], colors[upper][0], t)),
      Math.round(lerp(colors[lower][1], colors[upper][1], t)),
      Math.round(lerp(colors[lower][2], colors[upper][2], t)),
    ]
  }
}

export function sampleRamp(ramp: ColorRamp, value: number) {
  return createRampSampler(ramp)(value)
}

export function thumbnailSize(width: number, height: number, dimensions: number) {
  const longest = Math.max(width, height)
  const factor = dimensions / Math.max(1, longest)
  return {
    width: Math.max(1, Math.round(width * factor)),
    height: Math.max(1, Math.round(height * factor)),
  }
}

/**
 * Colour-maps a raster into a PNG whose longest side is `request.dimensions`.
 * Pixels outside the field or masked by clouds stay transparent.
 */
export function renderRasterPng(raster: SingleBandRaster, request: ThumbnailRequest) {
  const inside = rasterizeRegion(request.region, raster.bbox, raster.width, raster.height)
  const sample = createRampSampler(request.ramp)

  const { width, height } = thumbnailSize(raster.width, raster.height, request.dimensions)
  const png = new PNG({ width, height })

  for (let y = 0; y < height; y++) {
    const sourceY = Math.min(raster.height - 1, Math.floor((y / height) * raster.height))
    for (let x = 0; x < width; x++) {
      const sourceX = Math.min(raster.width - 1, Math.floor((x / width) * raster.width))
      const sourceIndex = sourceY * raster.width + sourceX
      const idx = (y * width + x) * 4
      const value = raster.values[sourceIndex]
      if (!inside[sourceIndex] || !raster.mask[sourceIndex] || !Number.isFinite(value)) {
        png.data[idx + 3] = 0
        continue
      }
      const [r, g, b] = sample(value)
      png.data[idx] = r
      png.data[idx + 1] = g
      png.data[idx + 2] = b
      png.data[idx + 3] = 255
    }
  }

  return PNG.sync.write(png)
}

export function toPngDataUrl(png: Buffer) {
  return `data:image/png;base64,${png.toString('base64')}`
}

/** Downloads a remotely rendered thumbnail so the overlay can be stored self-contained. */
export async function embedRemoteThumbnail(url: string, timeoutMs = 30000) {
  const bytes = await fetchBinaryWithRetry(url, {}, { retries: 0, timeoutMs })
  return toPngDataUrl(Buffer.from(bytes))
}
