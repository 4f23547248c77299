import type { AnalysisLocale, VIType } from '../types/api'
import messages from './classification-messages.json'
import { getVIFormula } from './indices'

/** Upper bounds (exclusive) of each bin; one more message than bounds per type. */
export const CLASSIFICATION_THRESHOLDS: Record<VIType, readonly number[]> = {
  NDVI: [0.2, 0.4, 0.6],
  EVI: [0.2, 0.4, 0.6],
  GNDVI: [0.3, 0.6, 0.8],
  NDWI: [0.0, 0.2, 0.4],
  SAVI: [0.2, 0.4, 0.6],
  VCI: [20, 40, 60, 80],
}

const MESSAGES: Record<AnalysisLocale, Record<VIType, readonly string[]>> = messages

export function classificationBin(meanValue: number, viType: VIType) {
  const bounds = CLASSIFICATION_THRESHOLDS[viType]
  const index = bounds.findIndex((bound) => meanValue < bound)
  return index === -1 ? bounds.length : index
}

export function generateAnalysisMessage(meanValue: number, viType: string, locale: AnalysisLocale = 'th') {
  const { type } = getVIFormula(viType)
  return MESSAGES[locale][type][classificationBin(meanValue, type)]
}
