import turfBbox from '@turf/bbox'
import booleanPointInPolygon from '@turf/boolean-point-in-polygon'
import { point } from '@turf/helpers'
import type { Position } from 'geojson'
import type { BBox, FieldGeometry } from '../types/api'
import { DataUnavailableError } from './errors'

export type RegionOfInterest = {
  geometry: FieldGeometry
  bbox: BBox
}

export type GridSize = {
  width: number
  height: number
}

const METERS_PER_DEGREE = 111320

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

function asPosition(value: unknown): Position | null {
  if (!Array.isArray(value) || value.length < 2) return null
  const [lon, lat] = value
  if (!isFiniteNumber(lon) || !isFiniteNumber(lat)) return null
  if (lon < -180 || lon > 180 || lat < -90 || lat > 90) return null
  return [lon, lat]
}

function normalizeRing(value: unknown): Position[] | null {
  if (!Array.isArray(value)) return null
  const ring: Position[] = []
  for (const raw of value) {
    const position = asPosition(raw)
    if (!position) return null
    ring.push(position)
  }
  if (ring.length < 4) return null
  const first = ring[0]
  const last = ring[ring.length - 1]
  if (first[0] !== last[0] || first[1] !== last[1]) return null
  return ring
}

function normalizeRings(value: unknown): Position[][] | null {
  if (!Array.isArray(value) || !value.length) return null
  const rings: Position[][] = []
  for (const raw of value) {
    const ring = normalizeRing(raw)
    if (!ring) return null
    rings.push(ring)
  }
  return rings
}

function unwrapGeometry(value: unknown): unknown {
  if (typeof value === 'string') {
    try {
      return unwrapGeometry(JSON.parse(value))
    } catch {
      return null
    }
  }
  if (value && typeof value === 'object' && 'type' in value && value.type === 'Feature' && 'geometry' in value) {
    return value.geometry
  }
  return value
}

function normalizeGeometry(value: unknown): FieldGeometry | null {
  const candidate = unwrapGeometry(value)
  if (!candidate || typeof candidate !== 'object' || !('type' in candidate) || !('coordinates' in candidate)) {
    return null
  }

  if (candidate.type === 'Polygon') {
    const rings = normalizeRings(candidate.coordinates)
    return rings ? { type: 'Polygon', coordinates: rings } : null
  }

  if (candidate.type === 'MultiPolygon') {
    if (!Array.isArray(candidate.coordinates) || !candidate.coordinates.length) return null
    const polygons: Position[][][] = []
    for (const raw of candidate.coordinates) {
      const rings = normalizeRings(raw)
      if (!rings) return null
      polygons.push(rings)
    }
    return { type: 'MultiPolygon', coordinates: polygons }
  }

  return null
}

/**
 * Validates a field boundary and computes its bounds. Fails with DataUnavailable,
 * the same way an analysis with no usable imagery would.
 */
export function parseFieldGeometry(value: unknown): RegionOfInterest {
  if (value == null) throw new DataUnavailableError('geometry_required')

  const geometry = normalizeGeometry(value)
  if (!geometry) throw new DataUnavailableError('invalid_geometry')

  const computed = turfBbox(geometry)
  if (computed.length !== 4 || computed.some((n) => !isFiniteNumber(n))) {
    throw new DataUnavailableError('invalid_geometry_bounds')
  }
  const bbox: BBox = [computed[0], computed[1], computed[2], computed[3]]
  if (bbox[2] <= bbox[0] || bbox[3] <= bbox[1]) {
    throw new DataUnavailableError('invalid_geometry_bounds')
  }

  return { geometry, bbox }
}

export function containsPoint(region: RegionOfInterest, lon: number, lat: number) {
  return booleanPointInPolygon(point([lon, lat]), region.geometry)
}

/** Pixel grid covering the bbox at roughly `scaleM` metres per pixel, capped at `maxSize`. */
export function nominalGridSize(bbox: BBox, scaleM: number, maxSize: number): GridSize {
  const [minLon, minLat, maxLon, maxLat] = bbox
  const midLat = ((minLat + maxLat) / 2) * (Math.PI / 180)
  const widthM = (maxLon - minLon) * METERS_PER_DEGREE * Math.max(0.01, Math.cos(midLat))
  const heightM = (maxLat - minLat) * METERS_PER_DEGREE

  let width = Math.max(1, Math.ceil(widthM / scaleM))
  let height = Math.max(1, Math.ceil(heightM / scaleM))
  const longest = Math.max(width, height)
  if (longest > maxSize) {
    const factor = maxSize / longest
    width = Math.max(1, Math.round(width * factor))
    height = Math.max(1, Math.round(height * factor))
  }
  return { width, height }
}

/** 1 where the pixel centre falls inside the region, 0 elsewhere. Row 0 is the northern edge. */
export function rasterizeRegion(region: RegionOfInterest, bbox: BBox, width: number, height: number) {
  const [minLon, minLat, maxLon, maxLat] = bbox
  const dx = (maxLon - minLon) / width
  const dy = (maxLat - minLat) / height
  const mask = new Uint8Array(width * height)

  for (let row = 0; row < height; row++) {
    const lat = maxLat - (row + 0.5) * dy
    for (let col = 0; col < width; col++) {
      const lon = minLon + (col + 0.5) * dx
      if (containsPoint(region, lon, lat)) mask[row * width + col] = 1
    }
  }
  return mask
}
