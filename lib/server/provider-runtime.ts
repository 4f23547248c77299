import PQueue from 'p-queue'
import { DataUnavailableError, ServiceUnavailableError } from './errors'

export type RetryOptions = {
  retries?: number
  timeoutMs?: number
  retryOnStatus?: number[]
}

export type RemoteThrottle = {
  run<T>(task: () => Promise<T>): Promise<T>
}

class HttpStatusError extends Error {
  readonly status: number

  constructor(status: number, body: string) {
    super(`http_${status}:${body.slice(0, 200)}`)
    this.name = 'HttpStatusError'
    this.status = status
  }
}

const DEFAULT_RETRY_STATUS = [408, 425, 429, 500, 502, 503, 504]

function isAbortError(error: unknown) {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
}

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/** The abort timer covers the body read as well as the headers. */
export async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>
) {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  try {
    const response = await fetch(url, { ...init, signal: controller.signal })
    return await read(response)
  } finally {
    clearTimeout(timeout)
  }
}

async function fetchWithRetry<T>(
  url: string,
  init: RequestInit,
  read: (response: Response) => Promise<T>,
  options?: RetryOptions
) {
  const retries = options?.retries ?? 1
  const timeoutMs = options?.timeoutMs ?? 12000
  const retryOn = new Set(options?.retryOnStatus || DEFAULT_RETRY_STATUS)

  let lastError: unknown = null
  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      const outcome = await fetchWithTimeout(url, init, timeoutMs, async (response) => {
        if (response.ok) return { ok: true as const, body: await read(response) }
        const text = await response.text().catch(() => '')
        return { ok: false as const, status: response.status, text }
      })
      if (outcome.ok) return outcome.body
      if (attempt < retries && retryOn.has(outcome.status)) {
        await sleep(350 * (attempt + 1))
        continue
      }
      throw new HttpStatusError(outcome.status, outcome.text)
    } catch (error) {
      lastError = error
      if (error instanceof HttpStatusError) break
      if (attempt < retries) {
        await sleep(350 * (attempt + 1))
        continue
      }
    }
  }
  throw toRemoteError(url, lastError)
}

/**
 * Maps transport failures onto the pipeline taxonomy: a stalled call is "no data"
 * for this request, anything else means the service itself is not usable.
 */
export function toRemoteError(url: string, error: unknown) {
  const host = safeHost(url)
  if (isAbortError(error)) {
    return new DataUnavailableError(`remote_timeout:${host}`, { cause: error })
  }
  if (error instanceof HttpStatusError) {
    if (error.status === 404 || error.status === 204) {
      return new DataUnavailableError(`remote_not_found:${host}`, { cause: error })
    }
    return new ServiceUnavailableError(`remote_http_${error.status}:${host}`, { cause: error })
  }
  const message = error instanceof Error ? error.message : 'fetch_failed'
  return new ServiceUnavailableError(`remote_unreachable:${host}:${message}`, { cause: error })
}

function safeHost(url: string) {
  try {
    return new URL(url).host
  } catch {
    return 'invalid-url'
  }
}

export async function fetchJsonWithRetry(url: string, init: RequestInit = {}, options?: RetryOptions): Promise<unknown> {
  const text = await fetchWithRetry(url, init, (response) => response.text(), options)
  try {
    return JSON.parse(text)
  } catch (error) {
    throw new ServiceUnavailableError(`remote_invalid_json:${safeHost(url)}`, { cause: error })
  }
}

export async function fetchBinaryWithRetry(url: string, init: RequestInit = {}, options?: RetryOptions) {
  return fetchWithRetry(url, init, (response) => response.arrayBuffer(), options)
}

/** One queue per client handle; keeps outbound calls under the provider's rate limits. */
export function createThrottle(options: { concurrency: number; intervalCap: number; intervalMs?: number }): RemoteThrottle {
  const queue = new PQueue({
    concurrency: options.concurrency,
    intervalCap: options.intervalCap,
    interval: options.intervalMs ?? 1000,
  })

  return {
    async run<T>(task: () => Promise<T>) {
      const result = await queue.add(task, { throwOnTimeout: true })
      return result
    },
  }
}
