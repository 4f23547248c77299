import { fromArrayBuffer } from 'geotiff'
import type { BBox } from '../types/api'
import type { AppConfig } from '../config/env'
import { makeCacheKey, createMemoryCache } from '../server/cache'
import { DataUnavailableError, ServiceUnavailableError } from '../server/errors'
import { nominalGridSize } from '../server/geometry'
import { silentLogger, type Logger } from '../server/log'
import {
  createThrottle,
  fetchBinaryWithRetry,
  fetchJsonWithRetry,
  type RetryOptions,
} from '../server/provider-runtime'
import { BAND_ASSETS, REFLECTANCE_SCALE, qaBitsFromSceneClass, type SpectralBand } from './bands'
import type { CollectionQuery, GeoComputePort, RawBands, RemoteScene } from './compute'
import { reduceRegionLocal } from './raster-ops'
import { renderRasterPng } from './render'

export type ComputeClientConfig = Pick<
  AppConfig,
  | 'stacApiUrl'
  | 'stacDataApiUrl'
  | 'stacCollection'
  | 'cloudCoverMax'
  | 'nominalScaleM'
  | 'maxRasterSize'
  | 'remoteTimeoutMs'
  | 'remoteRetries'
  | 'remoteConcurrency'
  | 'remoteIntervalCap'
  | 'searchCacheTtlMs'
  | 'features'
>

type JsonRecord = Record<string, unknown>

type NextPage = {
  href: string
  method: 'GET' | 'POST'
  body: JsonRecord | null
}

type SearchPage = {
  scenes: SceneDescriptor[]
  next: NextPage | null
}

type SceneDescriptor = {
  id: string
  acquiredAt: Date
  cloudPercentage: number
}

const SEARCH_PAGE_LIMIT = 100
const MAX_SEARCH_PAGES = 20
// The data API serves the scene classification layer; QA60 is synthesised from it.
const SCENE_CLASS_ASSET = 'SCL'

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function remoteAsset(band: SpectralBand) {
  return band === 'qa' ? SCENE_CLASS_ASSET : BAND_ASSETS[band]
}

function parseScene(feature: unknown): SceneDescriptor | null {
  if (!isRecord(feature) || typeof feature.id !== 'string') return null
  const properties = isRecord(feature.properties) ? feature.properties : {}
  const datetime = typeof properties.datetime === 'string' ? new Date(properties.datetime) : null
  if (!datetime || Number.isNaN(datetime.getTime())) return null
  const cloud = properties['eo:cloud_cover']
  return {
    id: feature.id,
    acquiredAt: datetime,
    cloudPercentage: typeof cloud === 'number' && Number.isFinite(cloud) ? cloud : 100,
  }
}

function parseNextLink(links: unknown): NextPage | null {
  if (!Array.isArray(links)) return null
  for (const link of links) {
    if (!isRecord(link) || link.rel !== 'next' || typeof link.href !== 'string') continue
    return {
      href: link.href,
      method: link.method === 'POST' ? 'POST' : 'GET',
      body: isRecord(link.body) ? link.body : null,
    }
  }
  return null
}

export function parseSearchPage(json: unknown): SearchPage {
  if (!isRecord(json) || !Array.isArray(json.features)) {
    throw new ServiceUnavailableError('stac_search_invalid_response')
  }
  const scenes: SceneDescriptor[] = []
  for (const feature of json.features) {
    const scene = parseScene(feature)
    if (scene) scenes.push(scene)
  }
  return { scenes, next: parseNextLink(json.links) }
}

export function buildCropUrl(params: {
  dataApiUrl: string
  collection: string
  itemId: string
  bbox: BBox
  width: number
  height: number
  assets: readonly string[]
}) {
  const url = new URL(`${params.dataApiUrl}/item/crop/${params.bbox.join(',')}/${params.width}x${params.height}.tif`)
  url.searchParams.set('collection', params.collection)
  url.searchParams.set('item', params.itemId)
  for (const asset of params.assets) url.searchParams.append('assets', asset)
  url.searchParams.set('asset_as_band', 'true')
  return url.toString()
}

/** Server-rendered preview of the same index, in reflectance units. */
export function buildPreviewUrl(params: {
  dataApiUrl: string
  collection: string
  itemId: string
  bbox: BBox
  expression: string
  rescale: [number, number]
  dimensions: number
}) {
  const expression = params.expression.replace(/B\d{2}/g, (asset) => `(${asset}*${REFLECTANCE_SCALE})`)
  const url = new URL(`${params.dataApiUrl}/item/preview.png`)
  url.searchParams.set('collection', params.collection)
  url.searchParams.set('item', params.itemId)
  url.searchParams.set('expression', expression)
  url.searchParams.set('asset_as_band', 'true')
  url.searchParams.set('rescale', params.rescale.join(','))
  url.searchParams.set('colormap_name', 'rdylgn')
  url.searchParams.set('bbox', params.bbox.join(','))
  url.searchParams.set('max_size', String(params.dimensions))
  url.searchParams.set('nodata', '0')
  return url.toString()
}

async function decodeBandStack(buffer: ArrayBuffer, bands: readonly SpectralBand[], bbox: BBox): Promise<RawBands> {
  const tiff = await fromArrayBuffer(buffer)
  const image = await tiff.getImage()
  const rasters = await image.readRasters({ interleave: false })
  if (!Array.isArray(rasters) || rasters.length < bands.length) {
    throw new DataUnavailableError(`crop_band_count_mismatch:${bands.length}`)
  }

  const width = image.getWidth()
  const height = image.getHeight()
  const decoded: RawBands['bands'] = {}
  bands.forEach((band, index) => {
    const values = Float32Array.from(rasters[index])
    if (band === 'qa') {
      for (let i = 0; i < values.length; i++) values[i] = qaBitsFromSceneClass(values[i])
    }
    decoded[band] = values
  })
  return { width, height, bbox, bands: decoded }
}

/**
 * Probes the STAC API once and returns a compute handle bound to it. Search pages
 * are cached per handle; every outbound request goes through the handle's queue.
 */
export async function createComputeClient(
  config: ComputeClientConfig,
  logger: Logger = silentLogger
): Promise<GeoComputePort> {
  const retry: RetryOptions = { retries: config.remoteRetries, timeoutMs: config.remoteTimeoutMs }
  const throttle = createThrottle({ concurrency: config.remoteConcurrency, intervalCap: config.remoteIntervalCap })
  const searchCache = createMemoryCache<SceneDescriptor[]>(config.features.searchCache ? config.searchCacheTtlMs : 0)

  try {
    await throttle.run(() => fetchJsonWithRetry(`${config.stacApiUrl}/collections/${config.stacCollection}`, {}, retry))
  } catch (error) {
    logger.error('compute_probe_failed', { url: config.stacApiUrl, error })
    throw new ServiceUnavailableError('compute_probe_failed', { cause: error })
  }
  logger.info('compute_client_ready', { collection: config.stacCollection })

  async function searchScenes(query: CollectionQuery) {
    const maxCloud = Math.min(query.maxCloudCover, config.cloudCoverMax)
    const key = makeCacheKey(['search', config.stacCollection, ...query.bbox, query.startDate, query.endDate, maxCloud])
    const cached = searchCache.read(key)
    if (cached) return cached

    const body: JsonRecord = {
      collections: [config.stacCollection],
      bbox: query.bbox,
      datetime: `${query.startDate}T00:00:00Z/${query.endDate}T00:00:00Z`,
      query: { 'eo:cloud_cover': { lt: maxCloud } },
      sortby: [{ field: 'properties.datetime', direction: 'asc' }],
      limit: SEARCH_PAGE_LIMIT,
    }

    const scenes: SceneDescriptor[] = []
    let request: NextPage | null = { href: `${config.stacApiUrl}/search`, method: 'POST', body }
    for (let page = 0; request && page < MAX_SEARCH_PAGES; page++) {
      const current: NextPage = request
      const json = await throttle.run(() =>
        fetchJsonWithRetry(
          current.href,
          current.method === 'POST'
            ? { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(current.body ?? body) }
            : {},
          retry
        )
      )
      const parsed = parseSearchPage(json)
      scenes.push(...parsed.scenes)
      request = parsed.next
    }

    // STAC datetime ranges are closed; the collection window is not.
    const endExclusive = new Date(`${query.endDate}T00:00:00Z`).getTime()
    const unique = new Map<string, SceneDescriptor>()
    for (const scene of scenes) {
      if (scene.acquiredAt.getTime() < endExclusive) unique.set(scene.id, scene)
    }
    const result = [...unique.values()]
    searchCache.write(key, result)
    logger.info('stac_search_done', { startDate: query.startDate, endDate: query.endDate, scenes: result.length })
    return result
  }

  function toRemoteScene(descriptor: SceneDescriptor, bbox: BBox): RemoteScene {
    return {
      ...descriptor,
      async readBands(bands) {
        const { width, height } = nominalGridSize(bbox, config.nominalScaleM, config.maxRasterSize)
        const url = buildCropUrl({
          dataApiUrl: config.stacDataApiUrl,
          collection: config.stacCollection,
          itemId: descriptor.id,
          bbox,
          width,
          height,
          assets: bands.map(remoteAsset),
        })
        const buffer = await throttle.run(() => fetchBinaryWithRetry(url, {}, retry))
        return decodeBandStack(buffer, bands, bbox)
      },
    }
  }

  return Object.freeze({
    async filterCollection(query: CollectionQuery) {
      const scenes = await searchScenes(query)
      return scenes.map((scene) => toRemoteScene(scene, query.bbox))
    },
    async reduceRegion(raster, region) {
      return reduceRegionLocal(raster, region)
    },
    async renderThumbnail(raster, request) {
      const [itemId] = request.sceneIds ?? []
      const url = itemId && request.expression
        ? buildPreviewUrl({
          dataApiUrl: config.stacDataApiUrl,
          collection: config.stacCollection,
          itemId,
          bbox: request.region.bbox,
          expression: request.expression,
          rescale: [request.ramp.min, request.ramp.max],
          dimensions: request.dimensions,
        })
        : null
      try {
        return { png: renderRasterPng(raster, request), url }
      } catch (error) {
        logger.warn('thumbnail_local_render_failed', { error })
        return { png: null, url }
      }
    },
  } satisfies GeoComputePort)
}
