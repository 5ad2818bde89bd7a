import { getErrorMessage } from '@/shared/lib/error'
import type { MediaPayload } from '../model/types'
import type { MediaLoader } from '../services/mediaLoader'

export const DEFAULT_PREFETCH_CAPACITY = 4

type Options = {
  loader: MediaLoader
  capacity?: number
  signal?: AbortSignal
}

/** Small LRU of decoded neighbours. Only image payloads are kept. */
export const createPrefetchCache = (opts: Options) => {
  const capacity = Math.max(0, Math.trunc(opts.capacity ?? DEFAULT_PREFETCH_CAPACITY))
  const cache = new Map<string, MediaPayload>()
  const inFlight = new Set<string>()
  let generation = 0

  const remember = (path: string, payload: MediaPayload) => {
    cache.delete(path)
    cache.set(path, payload)
    while (cache.size > capacity) {
      const oldest = cache.keys().next()
      if (oldest.done) break
      cache.delete(oldest.value)
    }
  }

  const get = (path: string) => {
    const payload = cache.get(path)
    if (!payload) return null
    remember(path, payload)
    return payload
  }

  const prefetch = (paths: Iterable<string | null>) => {
    for (const path of paths) {
      if (!path || capacity === 0 || opts.signal?.aborted) continue
      if (cache.has(path) || inFlight.has(path)) continue
      const genAtStart = generation
      inFlight.add(path)
      void opts.loader
        .load(path, { signal: opts.signal })
        .then((payload) => {
          if (opts.signal?.aborted || genAtStart !== generation) return
          if (payload.kind === 'image') remember(path, payload)
        })
        .catch((err) => {
          console.debug('Prefetch failed', { path, error: getErrorMessage(err) })
        })
        .finally(() => {
          if (genAtStart === generation) inFlight.delete(path)
        })
    }
  }

  /** Drops cached entries whose path is no longer listed. */
  const retain = (paths: Iterable<string>) => {
    const keep = new Set(paths)
    for (const path of [...cache.keys()]) {
      if (!keep.has(path)) cache.delete(path)
    }
  }

  const reset = () => {
    generation += 1
    cache.clear()
    inFlight.clear()
  }

  return {
    get,
    has: (path: string) => cache.has(path),
    prefetch,
    retain,
    drop: (path: string) => cache.delete(path),
    reset,
    size: () => cache.size,
    pending: () => inFlight.size,
  }
}

export type PrefetchCache = ReturnType<typeof createPrefetchCache>
