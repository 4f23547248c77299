import {
  VI_TYPES,
  type AnalysisLocale,
  type AnalysisType,
  type AnalyzeCurrentResponse,
  type BulkAnalysisResponse,
  type BulkAnalysisResult,
  type CurrentAnalysisResponse,
  type Granularity,
  type HistoricalAnalysisResponse,
  type LatestValues,
  type OverlayResponse,
  type TimeSeriesPoint,
  type TimeseriesResponse,
  type VISnapshot,
  type VIType,
} from '../types/api'
import { DataUnavailableError, toAnalysisErrorPayload } from '../server/errors'
import { parseFieldGeometry } from '../server/geometry'
import { silentLogger, type Logger } from '../server/log'
import type { SnapshotStore, TimeSeriesStore } from '../server/store'
import { aggregate } from '../satellite/aggregate'
import { getCollection } from '../satellite/collection'
import type { GeoComputePort } from '../satellite/compute'
import { addDays, toDateKey, toUtcDate, type DateInput } from '../satellite/dates'
import { getVIFormula } from '../satellite/indices'
import { selectDiverseObservations } from '../satellite/selector'
import { generateOverlay, getStatistics, type AnalysisContext } from '../satellite/statistics'
import { isCacheComplete } from './cache-completeness'

export const DEFAULT_TIMESERIES_DAYS = 90
export const DEFAULT_HISTORY_COUNT = 4
export const DEFAULT_SNAPSHOT_LIMIT = 10

export type AnalysisServiceDeps = {
  compute: GeoComputePort
  timeseries: TimeSeriesStore
  snapshots: SnapshotStore
  logger?: Logger
  locale?: AnalysisLocale
  now?: () => Date
}

export type TimeseriesRequest = {
  fieldId: string
  geometry: unknown
  viType: string
  startDate?: DateInput
  endDate?: DateInput
  analysisType?: AnalysisType | null
}

export type HistoricalRequest = {
  fieldId: string
  geometry: unknown
  viType?: string
  count?: number
}

export type CurrentRequest = {
  fieldId: string
  geometry: unknown
  viType: string
}

export type PreviewRequest = {
  geometry: unknown
  viType: string
  date?: DateInput
}

export type BulkRequest = {
  fieldId: string
  geometry: unknown
  viTypes: readonly string[]
}

export type SnapshotListOptions = {
  viType?: string
  limit?: number
}

export type AnalysisService = ReturnType<typeof createAnalysisService>

export function granularityFor(analysisType: AnalysisType | null | undefined): Granularity {
  return analysisType === 'ten_year_avg' ? 'yearly' : 'monthly'
}

export function createAnalysisService(deps: AnalysisServiceDeps) {
  const logger = deps.logger ?? silentLogger
  const now = deps.now ?? (() => new Date())
  const ctx: AnalysisContext = { compute: deps.compute, logger, locale: deps.locale ?? 'th' }

  function toPoints(fieldId: string, viType: VIType, points: readonly TimeSeriesPoint[]) {
    return points.map((point) => ({ fieldId, viType, date: point.date, value: point.value }))
  }

  async function fetchRemoteSeries(request: TimeseriesRequest, viType: VIType, start: Date, end: Date) {
    // The requested end day is inclusive; the collection end is exclusive.
    const through = addDays(toUtcDate(toDateKey(end)), 1)
    const { collection, region } = await getCollection(deps.compute, request.geometry, start, through, logger)
    if (collection.isEmpty()) return []
    return aggregate(ctx, collection, region, viType, start, end, granularityFor(request.analysisType))
  }

  /**
   * Stored series when they already cover the request, otherwise a fresh remote
   * aggregation that is persisted before it is returned.
   */
  async function getTimeseries(request: TimeseriesRequest): Promise<TimeseriesResponse> {
    const viType = getVIFormula(request.viType).type
    parseFieldGeometry(request.geometry)
    const end = request.endDate != null ? toUtcDate(request.endDate) : now()
    const start = request.startDate != null ? toUtcDate(request.startDate) : addDays(end, -DEFAULT_TIMESERIES_DAYS)
    const analysisType = request.analysisType ?? null

    const stored = await deps.timeseries.findInRange(request.fieldId, viType, toDateKey(start), toDateKey(end))
    if (isCacheComplete(stored, analysisType, start, end)) {
      logger.info('timeseries_cache_hit', { fieldId: request.fieldId, viType, points: stored.length })
      return {
        timeseries: stored.map(({ date, value }) => ({ date, value })),
        source: 'database',
        analysisType,
        count: stored.length,
      }
    }

    let points: TimeSeriesPoint[]
    try {
      points = await fetchRemoteSeries(request, viType, start, end)
    } catch (error) {
      if (!(error instanceof DataUnavailableError)) throw error
      logger.warn('timeseries_remote_unavailable', { fieldId: request.fieldId, viType, reason: error.reason })
      points = []
    }

    const saved = await deps.timeseries.insertMissing(toPoints(request.fieldId, viType, points))
    logger.info('timeseries_remote_fetched', { fieldId: request.fieldId, viType, points: points.length, saved })

    return {
      timeseries: points,
      source: 'remote',
      analysisType,
      count: points.length,
      ...(points.length ? {} : { message: 'No satellite data available for the requested range' }),
    }
  }

  async function analyzeHistorical(request: HistoricalRequest): Promise<HistoricalAnalysisResponse> {
    const viType = getVIFormula(request.viType ?? 'NDVI').type
    const observations = await selectDiverseObservations(
      ctx,
      request.geometry,
      viType,
      request.count ?? DEFAULT_HISTORY_COUNT,
      now()
    )

    if (!observations.length) {
      return {
        message: 'No historical images available for this field',
        snapshotsCreated: 0,
        uniqueDates: 0,
        viType,
        fieldId: request.fieldId,
      }
    }

    const createdDays = new Set<string>()
    let created = 0
    for (const observation of observations) {
      const dateKey = observation.acquiredAt.slice(0, 10)
      if (await deps.snapshots.existsOnDay(request.fieldId, viType, dateKey)) {
        logger.info('history_snapshot_exists', { fieldId: request.fieldId, viType, date: dateKey })
        continue
      }
      await deps.snapshots.insert({
        fieldId: request.fieldId,
        viType,
        snapshotDate: observation.acquiredAt,
        meanValue: observation.meanValue,
        minValue: observation.minValue,
        maxValue: observation.maxValue,
        overlayData: observation.overlayUrl,
        analysisMessage: observation.analysisMessage,
      })
      created += 1
      createdDays.add(dateKey)
    }

    logger.info('history_snapshots_created', { fieldId: request.fieldId, viType, created, observed: observations.length })
    return {
      message: `Historical analysis completed for ${created} snapshots with unique dates`,
      snapshotsCreated: created,
      uniqueDates: createdDays.size,
      viType,
      fieldId: request.fieldId,
    }
  }

  async function analyzeCurrent(request: CurrentRequest): Promise<AnalyzeCurrentResponse> {
    const viType = getVIFormula(request.viType).type
    const analysisDate = now()
    const stats = await getStatistics(ctx, request.geometry, viType, analysisDate)
    const overlay = await generateOverlay(ctx, request.geometry, viType, analysisDate)

    const snapshot = await deps.snapshots.insert({
      fieldId: request.fieldId,
      viType,
      snapshotDate: analysisDate.toISOString(),
      meanValue: stats.meanValue,
      minValue: stats.minValue,
      maxValue: stats.maxValue,
      overlayData: overlay,
      analysisMessage: stats.analysisMessage,
    })

    return {
      message: 'VI analysis completed and saved',
      snapshotId: snapshot.id,
      meanValue: stats.meanValue,
      analysisMessage: stats.analysisMessage,
    }
  }

  async function previewOverlay(request: PreviewRequest): Promise<OverlayResponse> {
    const viType = getVIFormula(request.viType).type
    const date = request.date != null ? toUtcDate(request.date) : now()
    const stats = await getStatistics(ctx, request.geometry, viType, date)
    const overlayUrl = await generateOverlay(ctx, request.geometry, viType, date)
    return {
      overlayUrl,
      meanValue: stats.meanValue,
      minValue: stats.minValue,
      maxValue: stats.maxValue,
      analysisMessage: stats.analysisMessage,
    }
  }

  /** Each requested type succeeds or fails on its own; failures are reported per type. */
  async function bulkAnalyze(request: BulkRequest): Promise<BulkAnalysisResponse> {
    const analysisDate = now()
    const results: Record<string, BulkAnalysisResult> = {}

    for (const requested of request.viTypes) {
      try {
        const viType = getVIFormula(requested).type
        const stats = await getStatistics(ctx, request.geometry, viType, analysisDate)
        const overlayUrl = await generateOverlay(ctx, request.geometry, viType, analysisDate)

        await deps.snapshots.insert({
          fieldId: request.fieldId,
          viType,
          snapshotDate: analysisDate.toISOString(),
          meanValue: stats.meanValue,
          minValue: stats.minValue,
          maxValue: stats.maxValue,
          overlayData: overlayUrl,
          analysisMessage: stats.analysisMessage,
        })
        await deps.timeseries.insertMissing([
          { fieldId: request.fieldId, viType, date: toDateKey(analysisDate), value: stats.meanValue },
        ])
        results[requested] = { success: true, stats, overlayUrl }
      } catch (error) {
        logger.warn('bulk_analysis_failed', { fieldId: request.fieldId, viType: requested, error })
        results[requested] = { success: false, error: toAnalysisErrorPayload(error, ctx.locale) }
      }
    }

    return { message: 'Bulk analysis completed', results, analysisDate: analysisDate.toISOString() }
  }

  async function getCurrent(fieldId: string, viTypeInput: string): Promise<CurrentAnalysisResponse> {
    const viType = getVIFormula(viTypeInput).type
    const latest = await deps.snapshots.latest(fieldId, viType)
    if (latest) {
      return {
        fieldId,
        viType,
        analysisDate: latest.snapshotDate,
        meanValue: latest.meanValue,
        minValue: latest.minValue,
        maxValue: latest.maxValue,
        analysisMessage: latest.analysisMessage,
        overlayData: latest.overlayData,
      }
    }
    return {
      fieldId,
      viType,
      analysisDate: null,
      meanValue: null,
      minValue: null,
      maxValue: null,
      analysisMessage: 'No analysis data available. Run an analysis to fetch data from satellite.',
      overlayData: null,
    }
  }

  async function listSnapshots(fieldId: string, options: SnapshotListOptions = {}): Promise<VISnapshot[]> {
    const viType = options.viType ? getVIFormula(options.viType).type : undefined
    return deps.snapshots.listRecent(fieldId, { viType, limit: options.limit ?? DEFAULT_SNAPSHOT_LIMIT })
  }

  async function getLatestValues(fieldId: string): Promise<LatestValues> {
    const entries = await Promise.all(
      VI_TYPES.map(async (viType) => {
        const latest = await deps.snapshots.latest(fieldId, viType)
        return [viType, latest ? { value: latest.meanValue, date: latest.snapshotDate, analysisMessage: latest.analysisMessage } : null] as const
      })
    )
    const values: LatestValues = { NDVI: null, EVI: null, GNDVI: null, NDWI: null, SAVI: null, VCI: null }
    for (const [viType, value] of entries) values[viType] = value
    return values
  }

  return {
    getTimeseries,
    analyzeHistorical,
    analyzeCurrent,
    previewOverlay,
    bulkAnalyze,
    getCurrent,
    listSnapshots,
    getLatestValues,
  }
}
