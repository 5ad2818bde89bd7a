export type MediaKind = 'image' | 'video'
export type MediaClass = MediaKind | 'unsupported'

export type SortOrder = 'alphabetical' | 'modified' | 'created'

export const SORT_ORDERS: readonly SortOrder[] = ['alphabetical', 'modified', 'created']
export const DEFAULT_SORT_ORDER: SortOrder = 'alphabetical'

export const isSortOrder = (value: unknown): value is SortOrder =>
  SORT_ORDERS.some((order) => order === value)

export type MediaEntry = Readonly<{
  path: string
  name: string
  kind: MediaKind
  sortKey: string | number
  modified: number
  created: number
}>

/** Immutable, ordered snapshot of the media files in one directory. */
export type DirectoryIndex = {
  readonly directory: string
  readonly entries: readonly MediaEntry[]
  readonly length: number
  get: (index: number) => MediaEntry | undefined
  indexOf: (path: string) => number
}

export type CursorPosition =
  | { type: 'indexed'; index: number }
  | { type: 'unresolved'; path: string }
  | { type: 'empty' }

export type Direction = 'next' | 'previous'
export type NavigationMode = 'all' | 'images'

export type LoadOrigin =
  | { type: 'direct_open' }
  | {
      type: 'navigation'
      direction: Direction
      mode: NavigationMode
      skipAttempts: number
      skippedFiles: readonly string[]
    }

export type OrchestratorState =
  | { type: 'idle' }
  | { type: 'loading'; origin: LoadOrigin; target: string; generation: number }

export type NavigationInfo = {
  hasNext: boolean
  hasPrevious: boolean
  atFirst: boolean
  atLast: boolean
  currentIndex: number | null
  totalCount: number
  filteredCount: number
  filterActive: boolean
}

export type MediaTypeFilter = 'all' | 'images' | 'videos'
export type DateField = 'modified' | 'created'

export type DateRange = {
  field: DateField
  start: number | null
  end: number | null
}

export type MediaFilter = {
  mediaType: MediaTypeFilter
  dateRange: DateRange | null
}

export type MediaPayload = {
  path: string
  kind: MediaKind
  bytes: Uint8Array
}

export type NotificationKind = 'info' | 'warning' | 'error'
export type MessageArgs = Record<string, string>

export type Notify = (
  kind: NotificationKind,
  key: string,
  args?: MessageArgs,
  durationMs?: number,
) => void
