import type { DateRange, MediaEntry, MediaFilter, MediaKind, MediaTypeFilter } from '../model/types'

export const emptyMediaFilter = (): MediaFilter => ({ mediaType: 'all', dateRange: null })

const isDateRangeActive = (range: DateRange | null) =>
  range !== null && (range.start !== null || range.end !== null)

export const isFilterActive = (filter: MediaFilter) =>
  filter.mediaType !== 'all' || isDateRangeActive(filter.dateRange)

export const activeFilterCount = (filter: MediaFilter) =>
  (filter.mediaType !== 'all' ? 1 : 0) + (isDateRangeActive(filter.dateRange) ? 1 : 0)

export const matchesMediaType = (mediaType: MediaTypeFilter, kind: MediaKind) => {
  if (mediaType === 'all') return true
  return mediaType === 'images' ? kind === 'image' : kind === 'video'
}

// Both bounds inclusive.
export const matchesDateRange = (range: DateRange | null, entry: MediaEntry) => {
  if (!range) return true
  const time = range.field === 'created' ? entry.created : entry.modified
  if (range.start !== null && time < range.start) return false
  if (range.end !== null && time > range.end) return false
  return true
}

export const matchesFilter = (filter: MediaFilter, entry: MediaEntry) =>
  matchesMediaType(filter.mediaType, entry.kind) && matchesDateRange(filter.dateRange, entry)
