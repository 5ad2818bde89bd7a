export { createMediaBrowser } from './createMediaBrowser'
export type { MediaBrowser, MediaBrowserOptions } from './createMediaBrowser'
export * from './model/types'
export { MediaDecodeError, MediaIoError, toMediaLoadError } from './model/errors'
export type { MediaLoadError } from './model/errors'
export {
  clampMaxSkipAttempts,
  DEFAULT_MAX_SKIP_ATTEMPTS,
  MAX_SKIP_ATTEMPTS,
  MIN_SKIP_ATTEMPTS,
} from './model/skipAttempts'
export {
  createExtensionDetector,
  defaultMediaTypeDetector,
  extensionOf,
  IMAGE_EXTENSIONS,
  VIDEO_EXTENSIONS,
} from './services/mediaTypes'
export type { MediaTypeDetector } from './services/mediaTypes'
export { createFileMediaLoader } from './services/mediaLoader'
export type { LoadOptions, MediaLoader } from './services/mediaLoader'
export { scanDirectory, scanFirstMedia, sortMediaEntries } from './services/scanner'
export type { ScanOptions } from './services/scanner'
export {
  createFileSettingsBackend,
  createMemorySettingsBackend,
  createNavigationSettings,
} from './services/settings'
export type { SettingsBackend } from './services/settings'
export { createDirectoryIndex, emptyDirectoryIndex } from './state/directoryIndex'
export { activeFilterCount, emptyMediaFilter, isFilterActive, matchesFilter } from './state/filter'
export { createNavigationCursor } from './state/cursor'
export type { NavigationCursor } from './state/cursor'
export { createLoadOrchestrator } from './state/orchestrator'
export type { LoadOrchestrator, LoadOrchestratorDeps, ScanFn } from './state/orchestrator'
export { createPrefetchCache, DEFAULT_PREFETCH_CAPACITY } from './state/prefetch'
export type { PrefetchCache } from './state/prefetch'
export { createNavigationPreferences } from './state/preferences'
export type { NavigationPreferences } from './state/preferences'
export { createSkipAggregator, formatSkippedFiles, truncateFilename } from './state/skipAggregator'
export { createLoadingIndicator } from './state/loadingIndicator'
export type { LoadingIndicator } from './state/loadingIndicator'
