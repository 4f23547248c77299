import { createAnalysisService, type AnalysisService } from './analysis/pipeline'
import { loadConfig, type AppConfig } from './config/env'
import { getAdminDb } from './firebaseAdmin'
import { createFirestoreSnapshotStore, createFirestoreTimeSeriesStore } from './server/firestore-store'
import { createLogger } from './server/log'
import { createComputeClient } from './satellite/stac-client'

export type { AnalysisService, AnalysisServiceDeps } from './analysis/pipeline'
export { createAnalysisService, granularityFor } from './analysis/pipeline'
export { isCacheComplete } from './analysis/cache-completeness'
export { loadConfig } from './config/env'
export type { AppConfig } from './config/env'
export {
  AnalysisError,
  DataUnavailableError,
  InvalidImageError,
  OverlayGenerationError,
  ServiceUnavailableError,
  UnsupportedVITypeError,
  toAnalysisErrorPayload,
} from './server/errors'
export { createLogger, silentLogger } from './server/log'
export type { Logger } from './server/log'
export { parseFieldGeometry } from './server/geometry'
export { createMemorySnapshotStore, createMemoryTimeSeriesStore } from './server/memory-store'
export { createFirestoreSnapshotStore, createFirestoreTimeSeriesStore } from './server/firestore-store'
export type { SnapshotStore, TimeSeriesStore } from './server/store'
export { aggregate, bucketsBetween } from './satellite/aggregate'
export { getCollection, ImageCollection } from './satellite/collection'
export type { GeoComputePort } from './satellite/compute'
export { computeVI, getVIFormula, meanComposite, VI_FORMULAS } from './satellite/indices'
export { selectDiverseObservations } from './satellite/selector'
export { generateOverlay, getStatistics } from './satellite/statistics'
export { generateAnalysisMessage } from './satellite/classification'
export { createComputeClient } from './satellite/stac-client'
export * from './types/api'

/** Production wiring: STAC compute client plus Firestore-backed stores. */
export async function createAnalysisServiceFromConfig(config: AppConfig = loadConfig()): Promise<AnalysisService> {
  const logger = createLogger('vi-analysis')
  const compute = await createComputeClient(config, createLogger('stac-client'))
  const db = getAdminDb(config)
  return createAnalysisService({
    compute,
    timeseries: createFirestoreTimeSeriesStore(db),
    snapshots: createFirestoreSnapshotStore(db),
    logger,
    locale: config.locale,
  })
}
