import type { AnalysisLocale, ApiErrorCode, ApiErrorResponse } from '../types/api'

export class AnalysisError extends Error {
  readonly code: ApiErrorCode
  readonly reason: string

  constructor(code: ApiErrorCode, reason: string, options?: { cause?: unknown }) {
    super(reason, options)
    this.name = 'AnalysisError'
    this.code = code
    this.reason = reason
  }
}

/** Remote compute service unreachable or rejecting our credentials. */
export class ServiceUnavailableError extends AnalysisError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('service_unavailable', reason, options)
    this.name = 'ServiceUnavailableError'
  }
}

export class DataUnavailableError extends AnalysisError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('data_unavailable', reason, options)
    this.name = 'DataUnavailableError'
  }
}

export class InvalidImageError extends AnalysisError {
  readonly missingBands: string[]

  constructor(missingBands: string[]) {
    super('invalid_image', `image_missing_bands:${missingBands.join(',')}`)
    this.name = 'InvalidImageError'
    this.missingBands = missingBands
  }
}

export class UnsupportedVITypeError extends AnalysisError {
  readonly viType: string

  constructor(viType: string) {
    super('unsupported_vi_type', `unsupported_vi_type:${viType}`)
    this.name = 'UnsupportedVITypeError'
    this.viType = viType
  }
}

export class OverlayGenerationError extends AnalysisError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('overlay_generation_failed', reason, options)
    this.name = 'OverlayGenerationError'
  }
}

const MESSAGES: Record<AnalysisLocale, Record<ApiErrorCode, string>> = {
  th: {
    service_unavailable: 'ไม่สามารถเชื่อมต่อบริการประมวลผลภาพดาวเทียมได้ กรุณาติดต่อผู้ดูแลระบบ',
    data_unavailable: 'ไม่สามารถดึงข้อมูลจากดาวเทียมได้ กรุณาลองใหม่อีกครั้ง',
    invalid_image: 'ภาพดาวเทียมไม่มีแบนด์ที่จำเป็นสำหรับการคำนวณดัชนี',
    unsupported_vi_type: 'ไม่รองรับดัชนีพืชพรรณประเภทนี้',
    overlay_generation_failed: 'ไม่สามารถสร้างภาพซ้อนทับดัชนีพืชพรรณได้',
    unknown_error: 'เกิดข้อผิดพลาดที่ไม่ทราบสาเหตุ',
  },
  en: {
    service_unavailable: 'The satellite compute service is unavailable. Please contact an administrator.',
    data_unavailable: 'No satellite data is available for this request. Please try again later.',
    invalid_image: 'The satellite scene is missing bands required for this index.',
    unsupported_vi_type: 'This vegetation index type is not supported.',
    overlay_generation_failed: 'The vegetation index overlay could not be generated.',
    unknown_error: 'An unknown error occurred.',
  },
}

export function errorMessage(code: ApiErrorCode, locale: AnalysisLocale) {
  return MESSAGES[locale][code]
}

export function toAnalysisErrorPayload(error: unknown, locale: AnalysisLocale = 'th'): ApiErrorResponse {
  if (error instanceof AnalysisError) {
    return {
      error: error.code,
      message: errorMessage(error.code, locale),
      reason: error.reason,
    }
  }

  return {
    error: 'unknown_error',
    message: errorMessage('unknown_error', locale),
    reason: error instanceof Error ? error.message : undefined,
  }
}
