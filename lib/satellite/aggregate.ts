import type { Granularity, TimeSeriesPoint } from '../types/api'
import { InvalidImageError, ServiceUnavailableError } from '../server/errors'
import type { RegionOfInterest } from '../server/geometry'
import type { ImageCollection } from './collection'
import { addMonths, addYears, startOfMonth, startOfYear, toDateKey, toUtcDate, type DateInput } from './dates'
import { computeVI, getVIFormula, meanComposite, type VIRaster } from './indices'
import type { AnalysisContext } from './statistics'

type Bucket = {
  start: Date
  end: Date
  label: string
}

const BUCKETS: Record<Granularity, { first(date: Date): Date; next(date: Date): Date; label(date: Date): string }> = {
  monthly: {
    first: startOfMonth,
    next: (date) => addMonths(date, 1),
    label: (date) => toDateKey(date).slice(0, 7),
  },
  yearly: {
    first: startOfYear,
    next: (date) => addYears(date, 1),
    label: (date) => String(date.getUTCFullYear()),
  },
}

export function bucketsBetween(startDate: Date, endDate: Date, granularity: Granularity): Bucket[] {
  const step = BUCKETS[granularity]
  const last = step.first(endDate)
  const buckets: Bucket[] = []
  for (let cursor = step.first(startDate); cursor <= last; cursor = step.next(cursor)) {
    buckets.push({ start: cursor, end: step.next(cursor), label: step.label(cursor) })
  }
  return buckets
}

/**
 * One point per month (or year) in range: the field mean of the per-pixel mean VI
 * across that bucket's scenes, dated at the bucket's first day. Buckets without
 * scenes or with a non-positive mean produce nothing; the latter also drops genuine
 * negative values such as open water.
 */
export async function aggregate(
  ctx: AnalysisContext,
  collection: ImageCollection,
  region: RegionOfInterest,
  viType: string,
  startDate: DateInput,
  endDate: DateInput,
  granularity: Granularity
): Promise<TimeSeriesPoint[]> {
  const formula = getVIFormula(viType)
  const points: TimeSeriesPoint[] = []

  for (const bucket of bucketsBetween(toUtcDate(startDate), toUtcDate(endDate), granularity)) {
    const scenes = collection.filterDate(bucket.start, bucket.end)
    if (scenes.isEmpty()) {
      ctx.logger.info('aggregate_bucket_empty', { bucket: bucket.label })
      continue
    }

    try {
      const rasters: VIRaster[] = []
      for (const scene of scenes.scenes) {
        const image = await scene.load(formula.bands)
        rasters.push(computeVI(image, formula.type))
      }
      const stats = await ctx.compute.reduceRegion(meanComposite(rasters), region)

      if (stats.mean == null || !(stats.mean > 0)) {
        ctx.logger.info('aggregate_bucket_invalid', { bucket: bucket.label, mean: stats.mean })
        continue
      }
      points.push({ date: toDateKey(bucket.start), value: stats.mean })
    } catch (error) {
      if (error instanceof ServiceUnavailableError || error instanceof InvalidImageError) throw error
      ctx.logger.warn('aggregate_bucket_failed', { bucket: bucket.label, error })
    }
  }

  ctx.logger.info('aggregate_done', { viType: formula.type, granularity, points: points.length })
  return points
}
