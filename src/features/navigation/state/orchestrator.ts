import { basename, dirname, resolve } from 'node:path'
import { get, readonly, writable } from 'svelte/store'
import { getErrorMessage } from '@/shared/lib/error'
import {
  DIRECTORY_READ_FAILED_KEY,
  EMPTY_DIRECTORY_KEY,
  LOAD_FAILED_KEY,
} from '@/features/notifications/messages'
import { toMediaLoadError, type MediaLoadError } from '../model/errors'
import { clampMaxSkipAttempts, DEFAULT_MAX_SKIP_ATTEMPTS } from '../model/skipAttempts'
import {
  DEFAULT_SORT_ORDER,
  type Direction,
  type DirectoryIndex,
  type LoadOrigin,
  type MediaPayload,
  type NavigationMode,
  type Notify,
  type OrchestratorState,
  type SortOrder,
} from '../model/types'
import type { MediaLoader } from '../services/mediaLoader'
import { scanDirectory } from '../services/scanner'
import type { NavigationCursor } from './cursor'
import { matchesFilter } from './filter'
import { createLoadingIndicator } from './loadingIndicator'
import type { PrefetchCache } from './prefetch'
import { createSkipAggregator, SKIP_NOTIFICATION_DURATION_MS } from './skipAggregator'

export type ScanFn = (path: string, sortOrder: SortOrder) => Promise<DirectoryIndex>

export type LoadOrchestratorDeps = {
  cursor: NavigationCursor
  loader: MediaLoader
  notify: Notify
  scan?: ScanFn
  getSortOrder?: () => SortOrder
  getMaxSkipAttempts?: () => number
  /** Aborting it stops all further work; late results are dropped. */
  signal?: AbortSignal
  prefetch?: PrefetchCache
  onLoaded?: (payload: MediaPayload) => void
  onLoadFailed?: (path: string, error: MediaLoadError) => void
  skipNotificationMs?: number
  loadingDelayMs?: number
}

type LoadOutcome = { ok: true; payload: MediaPayload } | { ok: false; error: MediaLoadError }

/**
 * Turns navigation gestures into loads. The cursor only moves once a load
 * succeeds; undecodable targets are skipped (up to the configured limit)
 * and reported together when the gesture ends.
 *
 * Every gesture takes a new generation. Results tagged with an older one
 * are discarded, so a later gesture supersedes an unfinished one.
 */
export const createLoadOrchestrator = (deps: LoadOrchestratorDeps) => {
  const { cursor, loader, notify, prefetch, signal } = deps
  const scan: ScanFn = deps.scan ?? ((path, sortOrder) => scanDirectory(path, sortOrder))
  const getSortOrder = deps.getSortOrder ?? (() => DEFAULT_SORT_ORDER)
  const maxSkipAttempts = () =>
    clampMaxSkipAttempts(deps.getMaxSkipAttempts?.() ?? DEFAULT_MAX_SKIP_ATTEMPTS)
  const aggregator = createSkipAggregator({
    notify,
    durationMs: deps.skipNotificationMs ?? SKIP_NOTIFICATION_DURATION_MS,
  })

  const state = writable<OrchestratorState>({ type: 'idle' })
  const loading = createLoadingIndicator({ delayMs: deps.loadingDelayMs })
  const lastError = writable<string | null>(null)
  let generation = 0

  const isShutdown = () => signal?.aborted === true
  const isCurrent = (gen: number) => gen === generation && !isShutdown()

  const toIdle = () => {
    state.set({ type: 'idle' })
    loading.request(false)
  }

  const installIndex = (next: DirectoryIndex) => {
    cursor.setIndex(next)
    prefetch?.retain(next.entries.map((entry) => entry.path))
  }

  const peekCandidate = (direction: Direction, mode: NavigationMode, steps: number) => {
    if (mode === 'images') {
      return direction === 'next' ? cursor.peekNthNextImage(steps) : cursor.peekNthPreviousImage(steps)
    }
    return direction === 'next'
      ? cursor.peekNthNextFiltered(steps)
      : cursor.peekNthPreviousFiltered(steps)
  }

  const warmNeighbours = (mode: NavigationMode) => {
    if (!prefetch) return
    const current = cursor.current()
    const list = get(cursor.index)
    const isImage = (path: string | null) => path !== null && list.get(list.indexOf(path))?.kind === 'image'
    const around = [peekCandidate('next', mode, 1), peekCandidate('previous', mode, 1)]
    prefetch.prefetch(around.filter((path) => path !== current && isImage(path)))
  }

  const attemptLoad = async (target: string): Promise<LoadOutcome> => {
    const cached = prefetch?.get(target)
    if (cached) return { ok: true, payload: cached }
    try {
      return { ok: true, payload: await loader.load(target, { signal }) }
    } catch (err) {
      return { ok: false, error: toMediaLoadError(target, err) }
    }
  }

  /** Resolves `true` only when the gesture confirmed a load. */
  const runGesture = async (gen: number, origin: LoadOrigin, firstTarget: string): Promise<boolean> => {
    let current = origin
    let target = firstTarget

    for (;;) {
      state.set({ type: 'loading', origin: current, target, generation: gen })
      loading.request(true)
      const outcome = await attemptLoad(target)

      if (isShutdown()) return false
      if (gen !== generation) {
        console.debug('Discarding superseded load result', { target })
        return false
      }

      if (outcome.ok) {
        cursor.confirmNavigation(target)
        lastError.set(null)
        if (current.type === 'navigation') aggregator.report(current.skippedFiles)
        toIdle()
        deps.onLoaded?.(outcome.payload)
        warmNeighbours(current.type === 'navigation' ? current.mode : 'all')
        return true
      }

      prefetch?.drop(target)
      deps.onLoadFailed?.(target, outcome.error)

      if (current.type === 'direct_open') {
        console.error('Failed to open media', { path: target, error: outcome.error.message })
        lastError.set(outcome.error.message)
        notify('error', LOAD_FAILED_KEY, { filename: basename(target) })
        toIdle()
        return false
      }

      console.debug('Skipping unreadable media', { path: target, error: outcome.error.message })
      const skipAttempts = current.skipAttempts + 1
      const skippedFiles = [...current.skippedFiles, basename(target)]
      const next =
        skipAttempts <= maxSkipAttempts()
          ? peekCandidate(current.direction, current.mode, skipAttempts + 1)
          : null

      if (next === null) {
        console.warn('Navigation stopped after skipping unreadable media', { skipAttempts })
        aggregator.report(skippedFiles)
        toIdle()
        return false
      }
      current = { ...current, skipAttempts, skippedFiles }
      target = next
    }
  }

  // Keeps the previous index when the rescan fails.
  const refreshIndex = async (gen: number) => {
    const from = cursor.current() ?? (get(cursor.index).directory || null)
    if (from === null) return
    try {
      const next = await scan(from, getSortOrder())
      if (isCurrent(gen)) installIndex(next)
    } catch (err) {
      if (isCurrent(gen)) {
        console.warn('Rescan failed, keeping previous index', { path: from, error: getErrorMessage(err) })
      }
    }
  }

  const navigate = async (direction: Direction, mode: NavigationMode = 'all') => {
    if (isShutdown()) return
    const gen = ++generation
    await refreshIndex(gen)
    if (!isCurrent(gen)) return

    const target = peekCandidate(direction, mode, 1)
    if (target === null) {
      toIdle()
      return
    }
    await runGesture(gen, { type: 'navigation', direction, mode, skipAttempts: 0, skippedFiles: [] }, target)
  }

  const reportDirectoryError = (path: string, err: unknown) => {
    const message = getErrorMessage(err)
    console.error('Failed to read directory', { path, error: message })
    lastError.set(message)
    notify('error', DIRECTORY_READ_FAILED_KEY, { directory: basename(path) })
    toIdle()
  }

  /**
   * Opens `path` directly: no skip-retry, a failure is reported as an error.
   * Resolves `true` once the file is loaded and confirmed.
   */
  const open = async (path: string) => {
    if (isShutdown()) return false
    const gen = ++generation
    const target = resolve(path)
    try {
      const next = await scan(target, getSortOrder())
      if (!isCurrent(gen)) return false
      installIndex(next)
    } catch (err) {
      if (isCurrent(gen)) reportDirectoryError(dirname(target), err)
      return false
    }
    return runGesture(gen, { type: 'direct_open' }, target)
  }

  /**
   * Opens the first media file of `directory` that passes the active filter.
   * Resolves its path, or `null` when there is none or it failed to load or
   * was superseded.
   */
  const openDirectory = async (directory: string) => {
    if (isShutdown()) return null
    const gen = ++generation
    const target = resolve(directory)
    let first: string | null
    try {
      const index = await scan(target, getSortOrder())
      if (!isCurrent(gen)) return null
      const filter = get(cursor.filter)
      first = index.entries.find((entry) => matchesFilter(filter, entry))?.path ?? null
    } catch (err) {
      if (isCurrent(gen)) reportDirectoryError(target, err)
      return null
    }
    if (first === null) {
      notify('info', EMPTY_DIRECTORY_KEY, { directory: basename(target) })
      toIdle()
      return null
    }
    return (await open(first)) ? first : null
  }

  /** Abandons the gesture in flight without reporting it. */
  const cancel = () => {
    generation += 1
    toIdle()
  }

  const dispose = () => {
    generation += 1
    state.set({ type: 'idle' })
    loading.dispose()
  }

  return {
    state: readonly(state),
    loading: { subscribe: loading.subscribe },
    lastError: readonly(lastError),
    navigate,
    navigateNext: (mode: NavigationMode = 'all') => navigate('next', mode),
    navigatePrevious: (mode: NavigationMode = 'all') => navigate('previous', mode),
    open,
    openDirectory,
    cancel,
    dispose,
    isIdle: () => get(state).type === 'idle',
  }
}

export type LoadOrchestrator = ReturnType<typeof createLoadOrchestrator>
