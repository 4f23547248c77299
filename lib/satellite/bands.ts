export type SpectralBand = 'blue' | 'green' | 'red' | 'nir' | 'swir1' | 'swir2' | 'qa'

export type ReflectanceBand = Exclude<SpectralBand, 'qa'>

/** Sentinel-2 asset codes. */
export const BAND_ASSETS: Record<SpectralBand, string> = {
  blue: 'B02',
  green: 'B03',
  red: 'B04',
  nir: 'B08',
  swir1: 'B11',
  swir2: 'B12',
  qa: 'QA60',
}

export const REFLECTANCE_SCALE = 0.0001

export const QA_CLOUD_BIT = 1 << 10
export const QA_CIRRUS_BIT = 1 << 11

export function isMaskedByQa(qaValue: number) {
  const bits = Math.trunc(qaValue)
  return (bits & QA_CLOUD_BIT) !== 0 || (bits & QA_CIRRUS_BIT) !== 0
}

// Scene classification classes of L2A products.
const SCL_CLOUD_MEDIUM = 8
const SCL_CLOUD_HIGH = 9
const SCL_THIN_CIRRUS = 10

/** Maps a scene classification value onto the QA60 cloud/cirrus bits. */
export function qaBitsFromSceneClass(sceneClass: number) {
  if (sceneClass === SCL_CLOUD_MEDIUM || sceneClass === SCL_CLOUD_HIGH) return QA_CLOUD_BIT
  if (sceneClass === SCL_THIN_CIRRUS) return QA_CIRRUS_BIT
  return 0
}
