import { get } from 'svelte/store'
import { createNotificationCenter } from '@/features/notifications/notifications'
import type { MediaPayload } from './model/types'
import type { MediaLoadError } from './model/errors'
import { createFileMediaLoader, type MediaLoader } from './services/mediaLoader'
import { defaultMediaTypeDetector, type MediaTypeDetector } from './services/mediaTypes'
import { scanDirectory } from './services/scanner'
import { createMemorySettingsBackend, type SettingsBackend } from './services/settings'
import { createNavigationCursor } from './state/cursor'
import { createLoadOrchestrator } from './state/orchestrator'
import { createPrefetchCache, DEFAULT_PREFETCH_CAPACITY } from './state/prefetch'
import { createNavigationPreferences } from './state/preferences'

export type MediaBrowserOptions = {
  settings?: SettingsBackend
  loader?: MediaLoader
  detector?: MediaTypeDetector
  /** 0 disables neighbour prefetching. */
  prefetchCapacity?: number
  initialPath?: string
  onLoaded?: (payload: MediaPayload) => void
  onLoadFailed?: (path: string, error: MediaLoadError) => void
}

export const createMediaBrowser = (options: MediaBrowserOptions = {}) => {
  const controller = new AbortController()
  const detector = options.detector ?? defaultMediaTypeDetector
  const preferences = createNavigationPreferences(options.settings ?? createMemorySettingsBackend())
  const notifications = createNotificationCenter()
  const cursor = createNavigationCursor(options.initialPath ?? null)
  const loader = options.loader ?? createFileMediaLoader({ detector })
  const capacity = options.prefetchCapacity ?? DEFAULT_PREFETCH_CAPACITY
  const prefetch =
    capacity > 0 ? createPrefetchCache({ loader, capacity, signal: controller.signal }) : undefined

  const orchestrator = createLoadOrchestrator({
    cursor,
    loader,
    prefetch,
    notify: notifications.emit,
    scan: (path, sortOrder) => scanDirectory(path, sortOrder, { detector }),
    getSortOrder: () => get(preferences.sortOrder),
    getMaxSkipAttempts: () => get(preferences.maxSkipAttempts),
    signal: controller.signal,
    onLoaded: options.onLoaded,
    onLoadFailed: options.onLoadFailed,
  })

  const setup = async () => {
    await preferences.loadPreferences()
  }

  const shutdown = () => {
    if (controller.signal.aborted) return
    controller.abort()
    orchestrator.dispose()
    prefetch?.reset()
    notifications.clear()
  }

  return {
    ...orchestrator,
    cursor,
    preferences,
    notifications: notifications.notifications,
    dismissNotification: notifications.dismiss,
    currentPath: cursor.currentPath,
    info: cursor.info,
    setFilter: cursor.setFilter,
    clearFilter: cursor.clearFilter,
    setup,
    shutdown,
    isShutdown: () => controller.signal.aborted,
  }
}

export type MediaBrowser = ReturnType<typeof createMediaBrowser>
