import type { Feature, MultiPolygon, Polygon } from 'geojson'

export type BBox = [number, number, number, number]

export type FieldGeometry = Polygon | MultiPolygon

export type FieldGeometryInput = FieldGeometry | Feature<FieldGeometry>

export type VIType = 'NDVI' | 'EVI' | 'GNDVI' | 'NDWI' | 'SAVI' | 'VCI'

export const VI_TYPES: readonly VIType[] = ['NDVI', 'EVI', 'GNDVI', 'NDWI', 'SAVI', 'VCI']

export type AnalysisType = 'full_year' | 'monthly_range' | 'ten_year_avg'

export type Granularity = 'monthly' | 'yearly'

export type AnalysisLocale = 'th' | 'en'

export type ApiErrorCode =
  | 'service_unavailable'
  | 'data_unavailable'
  | 'invalid_image'
  | 'unsupported_vi_type'
  | 'overlay_generation_failed'
  | 'unknown_error'

export type ApiErrorResponse = {
  error: ApiErrorCode
  message: string
  reason?: string
}

export type VIStatistic = {
  meanValue: number
  minValue: number
  maxValue: number
  analysisMessage: string
  /** Date the caller asked about, not the acquisition date of the scene. */
  measurementDate: string
  acquiredAt: string
}

export type TimeSeriesPoint = {
  date: string
  value: number
}

export type StoredTimeSeriesPoint = TimeSeriesPoint & {
  fieldId: string
  viType: VIType
}

export type HistoricalObservation = {
  acquiredAt: string
  meanValue: number
  minValue: number
  maxValue: number
  overlayUrl: string
  analysisMessage: string
}

export type VISnapshot = {
  id: string
  fieldId: string
  viType: VIType
  snapshotDate: string
  meanValue: number
  minValue: number
  maxValue: number
  overlayData: string
  analysisMessage: string
}

export type NewVISnapshot = Omit<VISnapshot, 'id'>

export type TimeseriesSource = 'database' | 'remote'

export type TimeseriesResponse = {
  timeseries: TimeSeriesPoint[]
  source: TimeseriesSource
  analysisType: AnalysisType | null
  count: number
  message?: string
}

export type OverlayResponse = {
  overlayUrl: string
  meanValue: number
  minValue: number
  maxValue: number
  analysisMessage: string
}

export type HistoricalAnalysisResponse = {
  message: string
  snapshotsCreated: number
  uniqueDates: number
  viType: VIType
  fieldId: string
}

export type CurrentAnalysisResponse = {
  fieldId: string
  viType: VIType
  analysisDate: string | null
  meanValue: number | null
  minValue: number | null
  maxValue: number | null
  analysisMessage: string
  overlayData: string | null
}

export type LatestValue = {
  value: number
  date: string
  analysisMessage: string
}

export type BulkAnalysisResult =
  | { success: true; stats: VIStatistic; overlayUrl: string }
  | { success: false; error: ApiErrorResponse }

export type BulkAnalysisResponse = {
  message: string
  /** Keyed by the requested type, including unsupported ones. */
  results: Record<string, BulkAnalysisResult>
  analysisDate: string
}

export type AnalyzeCurrentResponse = {
  message: string
  snapshotId: string
  meanValue: number
  analysisMessage: string
}

export type LatestValues = Record<VIType, LatestValue | null>
