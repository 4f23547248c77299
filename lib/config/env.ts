import dotenv from 'dotenv'
import type { AnalysisLocale } from '../types/api'

dotenv.config()

type Env = Record<string, string | undefined>

export type AppConfig = {
  stacApiUrl: string
  stacDataApiUrl: string
  stacCollection: string
  cloudCoverMax: number
  nominalScaleM: number
  maxRasterSize: number
  remoteTimeoutMs: number
  remoteRetries: number
  remoteConcurrency: number
  remoteIntervalCap: number
  searchCacheTtlMs: number
  locale: AnalysisLocale
  firebaseServiceAccountJson: string | null
  features: {
    searchCache: boolean
  }
}

const DEFAULTS = {
  stacApiUrl: 'https://planetarycomputer.microsoft.com/api/stac/v1',
  stacDataApiUrl: 'https://planetarycomputer.microsoft.com/api/data/v1',
  stacCollection: 'sentinel-2-l2a',
  cloudCoverMax: 30,
  nominalScaleM: 10,
  maxRasterSize: 1024,
  remoteTimeoutMs: 25000,
  remoteRetries: 1,
  remoteConcurrency: 2,
  remoteIntervalCap: 5,
  searchCacheTtlMs: 10 * 60 * 1000,
} as const

function envEnabled(env: Env, name: string, defaultValue: boolean) {
  const value = env[name]
  if (value == null) return defaultValue
  return value === '1' || value.toLowerCase() === 'true' || value.toLowerCase() === 'yes'
}

function envNumber(env: Env, name: string, defaultValue: number, min = 0) {
  const raw = env[name]
  if (raw == null || raw.trim() === '') return defaultValue
  const parsed = Number(raw)
  return Number.isFinite(parsed) && parsed >= min ? parsed : defaultValue
}

function envString(env: Env, name: string, defaultValue: string) {
  const value = env[name]?.trim()
  return value ? value.replace(/\/+$/, '') : defaultValue
}

function envLocale(env: Env): AnalysisLocale {
  return env.ANALYSIS_LOCALE?.toLowerCase() === 'en' ? 'en' : 'th'
}

export function loadConfig(env: Env = process.env): AppConfig {
  return Object.freeze({
    stacApiUrl: envString(env, 'STAC_API_URL', DEFAULTS.stacApiUrl),
    stacDataApiUrl: envString(env, 'STAC_DATA_API_URL', DEFAULTS.stacDataApiUrl),
    stacCollection: envString(env, 'STAC_COLLECTION', DEFAULTS.stacCollection),
    cloudCoverMax: envNumber(env, 'CLOUD_COVER_MAX', DEFAULTS.cloudCoverMax),
    nominalScaleM: envNumber(env, 'NOMINAL_SCALE_M', DEFAULTS.nominalScaleM, 1),
    maxRasterSize: envNumber(env, 'MAX_RASTER_SIZE', DEFAULTS.maxRasterSize, 16),
    remoteTimeoutMs: envNumber(env, 'REMOTE_TIMEOUT_MS', DEFAULTS.remoteTimeoutMs, 1),
    remoteRetries: envNumber(env, 'REMOTE_RETRIES', DEFAULTS.remoteRetries),
    remoteConcurrency: envNumber(env, 'REMOTE_CONCURRENCY', DEFAULTS.remoteConcurrency, 1),
    remoteIntervalCap: envNumber(env, 'REMOTE_INTERVAL_CAP', DEFAULTS.remoteIntervalCap, 1),
    searchCacheTtlMs: envNumber(env, 'SEARCH_CACHE_TTL_MS', DEFAULTS.searchCacheTtlMs),
    locale: envLocale(env),
    firebaseServiceAccountJson: env.FIREBASE_SERVICE_ACCOUNT_JSON?.trim() || null,
    features: {
      searchCache: envEnabled(env, 'FEATURE_SEARCH_CACHE', true),
    },
  })
}
