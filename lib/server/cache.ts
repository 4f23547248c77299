import { createHash } from 'crypto'

type CacheEntry<T> = {
  value: T
  expiresAt: number
}

export type MemoryCache<T> = {
  read(key: string): T | null
  write(key: string, value: T): void
}

export function makeCacheKey(parts: Array<string | number | boolean>) {
  return createHash('sha1').update(parts.join('|')).digest('hex')
}

/**
 * TTL cache owned by a single client handle. A ttl of 0 disables writes. Expired entries are pruned on
 * write, and the oldest entry is evicted once `maxEntries` is reached.
 */
export function createMemoryCache<T>(
  ttlMs: number,
  options: { now?: () => number; maxEntries?: number } = {}
): MemoryCache<T> {
  const now = options.now ?? Date.now
  const maxEntries = options.maxEntries ?? 256
  const store = new Map<string, CacheEntry<T>>()

  return {
    read(key) {
      const entry = store.get(key)
      if (!entry) return null
      if (now() > entry.expiresAt) {
        store.delete(key)
        return null
      }
      return entry.value
    },
    write(key, value) {
      if (ttlMs <= 0) return
      const at = now()
      for (const [existing, entry] of store) {
        if (at > entry.expiresAt) store.delete(existing)
      }
      store.delete(key)
      if (store.size >= maxEntries) {
        const oldest = store.keys().next()
        if (!oldest.done) store.delete(oldest.value)
      }
      store.set(key, { value, expiresAt: at + ttlMs })
    },
  }
}
