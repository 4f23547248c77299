import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger, formatLogLine } from './log'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('formatLogLine', () => {
  it('writes one JSON object per line', () => {
    const line = JSON.parse(formatLogLine('info', 'stac-client', 'stac_search_done', { scenes: 3 }))
    expect(line).toMatchObject({ level: 'info', scope: 'stac-client', event: 'stac_search_done', scenes: 3 })
    expect(typeof line.ts).toBe('string')
  })

  it('normalises errors and bigints', () => {
    const line = JSON.parse(formatLogLine('error', 'vi-analysis', 'failed', { error: new Error('boom'), big: 10n }))
    expect(line.error).toMatchObject({ name: 'Error', message: 'boom' })
    expect(line.big).toBe('10')
  })

  it('reports values it cannot serialise', () => {
    const cyclic: Record<string, unknown> = {}
    cyclic.self = cyclic
    const line = JSON.parse(formatLogLine('warn', 'vi-analysis', 'original_event', { cyclic }))
    expect(line).toMatchObject({ level: 'error', event: 'log_serialize_error', originalEvent: 'original_event' })
  })
})

describe('createLogger', () => {
  it('routes levels to the matching console method', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    createLogger('vi-analysis').warn('overlay_unavailable', { viType: 'NDVI' })
    expect(warn).toHaveBeenCalledTimes(1)
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({ event: 'overlay_unavailable', viType: 'NDVI' })
  })
})
