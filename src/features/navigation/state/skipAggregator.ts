import { basename } from 'node:path'
import { SKIPPED_FILES_KEY } from '@/features/notifications/messages'
import type { Notify } from '../model/types'

export const SKIP_NOTIFICATION_DURATION_MS = 8000
const MAX_FILENAME_CHARS = 12
const MAX_LISTED_FILES = 5

export const truncateFilename = (name: string) => {
  const chars = Array.from(name)
  if (chars.length <= MAX_FILENAME_CHARS) return name
  return `${chars.slice(0, MAX_FILENAME_CHARS - 1).join('')}…`
}

/** `a`, `a, b`, up to five names, then `+N more`. */
export const formatSkippedFiles = (names: readonly string[]) => {
  const listed = names.slice(0, MAX_LISTED_FILES).map(truncateFilename).join(', ')
  const rest = names.length - MAX_LISTED_FILES
  return rest > 0 ? `${listed} +${rest} more` : listed
}

type AggregatorOptions = {
  notify: Notify
  durationMs?: number
}

export const createSkipAggregator = ({ notify, durationMs = SKIP_NOTIFICATION_DURATION_MS }: AggregatorOptions) => {
  /** Emits one warning for a finished gesture; returns false when nothing was skipped. */
  const report = (skippedFiles: readonly string[]) => {
    if (skippedFiles.length === 0) return false
    const names = skippedFiles.map((file) => basename(file))
    console.warn('Skipped unreadable media', names)
    notify(
      'warning',
      SKIPPED_FILES_KEY,
      { files: formatSkippedFiles(names), count: String(names.length) },
      durationMs,
    )
    return true
  }

  return { report }
}

export type SkipAggregator = ReturnType<typeof createSkipAggregator>
