import type { AnalysisLocale, VIStatistic } from '../types/api'
import {
  AnalysisError,
  DataUnavailableError,
  OverlayGenerationError,
  ServiceUnavailableError,
} from '../server/errors'
import type { RegionOfInterest } from '../server/geometry'
import type { Logger } from '../server/log'
import { generateAnalysisMessage } from './classification'
import { getCollection } from './collection'
import type { GeoComputePort, ThumbnailResult } from './compute'
import { addDays, toUtcDate, type DateInput } from './dates'
import { computeVI, getVIFormula, type VIRaster } from './indices'
import { VIS_PARAMS, embedRemoteThumbnail, toPngDataUrl } from './render'

export const SCENE_WINDOW_DAYS = 7
export const THUMBNAIL_DIMENSIONS = 512

export type AnalysisContext = {
  compute: GeoComputePort
  logger: Logger
  locale: AnalysisLocale
}

type LoadedRaster = {
  raster: VIRaster
  region: RegionOfInterest
}

/** Newest scene within ±7 days of `date` (or the widened window), as a VI raster. */
async function loadSceneRaster(ctx: AnalysisContext, geometry: unknown, viType: string, date: Date): Promise<LoadedRaster> {
  const formula = getVIFormula(viType)
  const { collection, region } = await getCollection(
    ctx.compute,
    geometry,
    addDays(date, -SCENE_WINDOW_DAYS),
    addDays(date, SCENE_WINDOW_DAYS),
    ctx.logger
  )

  const scene = collection.latest()
  if (!scene) throw new DataUnavailableError('no_suitable_images')

  const image = await scene.load(formula.bands)
  return { raster: computeVI(image, formula.type), region }
}

/**
 * Treats a mean of exactly 0 as a failed reduction for every index but NDWI. This is
 * a heuristic inherited from the imagery backend: bare soil can legitimately sit at 0.
 */
export function isDegenerateMean(mean: number | null, viType: string) {
  if (mean == null || !Number.isFinite(mean)) return true
  return viType !== 'NDWI' && mean === 0
}

export async function getStatistics(
  ctx: AnalysisContext,
  geometry: unknown,
  viType: string,
  dateInput: DateInput = new Date()
): Promise<VIStatistic> {
  const date = toUtcDate(dateInput)
  const { raster, region } = await loadSceneRaster(ctx, geometry, viType, date)
  const stats = await ctx.compute.reduceRegion(raster, region)

  if (stats.mean == null || !Number.isFinite(stats.mean)) throw new DataUnavailableError('no_statistics_returned')
  if (isDegenerateMean(stats.mean, raster.viType)) throw new DataUnavailableError('zero_mean_detected')

  return {
    meanValue: stats.mean,
    minValue: stats.min ?? stats.mean,
    maxValue: stats.max ?? stats.mean,
    analysisMessage: generateAnalysisMessage(stats.mean, raster.viType, ctx.locale),
    measurementDate: date.toISOString(),
    acquiredAt: raster.acquiredAt.toISOString(),
  }
}

/**
 * Renders a VI raster through its colour ramp. Prefers an embedded PNG, then the
 * provider's rendered URL (embedded if it can be downloaded, otherwise as-is).
 */
export async function renderOverlay(ctx: AnalysisContext, raster: VIRaster, region: RegionOfInterest) {
  const formula = getVIFormula(raster.viType)
  let thumbnail: ThumbnailResult
  try {
    thumbnail = await ctx.compute.renderThumbnail(raster, {
      region,
      ramp: VIS_PARAMS[formula.type],
      dimensions: THUMBNAIL_DIMENSIONS,
      expression: formula.expression,
      sceneIds: raster.sceneIds,
    })
  } catch (error) {
    if (error instanceof ServiceUnavailableError) throw error
    throw new OverlayGenerationError('thumbnail_render_failed', { cause: error })
  }

  if (thumbnail.png) return toPngDataUrl(thumbnail.png)
  if (!thumbnail.url) throw new OverlayGenerationError('thumbnail_empty')

  try {
    return await embedRemoteThumbnail(thumbnail.url)
  } catch (error) {
    ctx.logger.warn('overlay_embed_failed', { error })
    return thumbnail.url
  }
}

/** Returns '' when no overlay can be produced for this date; configuration errors still throw. */
export async function generateOverlay(
  ctx: AnalysisContext,
  geometry: unknown,
  viType: string,
  dateInput: DateInput = new Date()
): Promise<string> {
  try {
    const date = toUtcDate(dateInput)
    const { raster, region } = await loadSceneRaster(ctx, geometry, viType, date)
    return await renderOverlay(ctx, raster, region)
  } catch (caught) {
    const error = caught instanceof AnalysisError
      ? caught
      : new OverlayGenerationError('overlay_unexpected_failure', { cause: caught })
    if (error instanceof OverlayGenerationError || error instanceof DataUnavailableError) {
      ctx.logger.warn('overlay_unavailable', { viType, reason: error.reason, cause: error.cause })
      return ''
    }
    throw error
  }
}
