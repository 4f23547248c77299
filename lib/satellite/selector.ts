import type { HistoricalObservation } from '../types/api'
import { AnalysisError, InvalidImageError, ServiceUnavailableError } from '../server/errors'
import { generateAnalysisMessage } from './classification'
import { getCollection } from './collection'
import { addDays, dayIndex, toDateKey, toUtcDate, type DateInput } from './dates'
import { computeVI, getVIFormula } from './indices'
import { isDegenerateMean, renderOverlay, type AnalysisContext } from './statistics'

export const HISTORY_WINDOW_DAYS = 180
export const MIN_GAP_DAYS = 5
export const CANDIDATES_PER_RESULT = 5

/**
 * Picks up to `limit` recent observations whose dates are at least five calendar
 * days apart, newest first. Each candidate is reduced and rendered in turn; a failed
 * candidate is skipped, and the scan never looks past `limit × 5` scenes.
 */
export async function selectDiverseObservations(
  ctx: AnalysisContext,
  geometry: unknown,
  viType: string,
  limit = 4,
  now: DateInput = new Date()
): Promise<HistoricalObservation[]> {
  const formula = getVIFormula(viType)
  const end = toUtcDate(now)
  const { collection, region } = await getCollection(
    ctx.compute,
    geometry,
    addDays(end, -HISTORY_WINDOW_DAYS),
    end,
    ctx.logger
  )

  if (collection.isEmpty() || limit <= 0) {
    ctx.logger.info('history_no_images', { viType: formula.type })
    return []
  }

  const candidates = collection.newestFirst()
  const maxAttempts = Math.min(candidates.length, limit * CANDIDATES_PER_RESULT)
  const acceptedDays = new Map<string, number>()
  const observations: HistoricalObservation[] = []

  for (let i = 0; i < maxAttempts && observations.length < limit; i++) {
    const scene = candidates[i]
    const dateKey = toDateKey(scene.acquiredAt)
    const day = dayIndex(scene.acquiredAt)

    if (acceptedDays.has(dateKey)) {
      ctx.logger.info('history_skip_duplicate', { date: dateKey })
      continue
    }
    const tooClose = [...acceptedDays.entries()].find(([, existing]) => Math.abs(day - existing) < MIN_GAP_DAYS)
    if (tooClose) {
      ctx.logger.info('history_skip_close', { date: dateKey, closeTo: tooClose[0] })
      continue
    }

    try {
      const image = await scene.load(formula.bands)
      const raster = computeVI(image, formula.type)
      const stats = await ctx.compute.reduceRegion(raster, region)
      if (stats.mean == null || isDegenerateMean(stats.mean, formula.type)) {
        ctx.logger.info('history_skip_empty_stats', { date: dateKey, mean: stats.mean })
        continue
      }

      const overlayUrl = await renderOverlay(ctx, raster, region)
      observations.push({
        acquiredAt: scene.acquiredAt.toISOString(),
        meanValue: stats.mean,
        minValue: stats.min ?? stats.mean,
        maxValue: stats.max ?? stats.mean,
        overlayUrl,
        analysisMessage: generateAnalysisMessage(stats.mean, formula.type, ctx.locale),
      })
      acceptedDays.set(dateKey, day)
    } catch (error) {
      if (error instanceof ServiceUnavailableError || error instanceof InvalidImageError) throw error
      ctx.logger.warn('history_candidate_failed', {
        date: dateKey,
        sceneId: scene.id,
        reason: error instanceof AnalysisError ? error.reason : undefined,
        error,
      })
    }
  }

  ctx.logger.info('history_selected', { viType: formula.type, selected: observations.length, available: candidates.length })
  return observations.sort((a, b) => b.acquiredAt.localeCompare(a.acquiredAt))
}
