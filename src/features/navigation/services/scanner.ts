import { basename, dirname, join, resolve } from 'node:path'
import type { Dirent } from 'node:fs'
import { getErrorMessage } from '@/shared/lib/error'
import { listDirectory, tryStat } from '@/shared/lib/fs'
import { MediaIoError } from '../model/errors'
import type { DirectoryIndex, MediaEntry, MediaFilter, SortOrder } from '../model/types'
import { createDirectoryIndex } from '../state/directoryIndex'
import { matchesFilter } from '../state/filter'
import { defaultMediaTypeDetector, type MediaTypeDetector } from './mediaTypes'

export type ScanOptions = {
  detector?: MediaTypeDetector
}

const compareString = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0)

const compareSortKey = (a: string | number, b: string | number) => {
  if (typeof a === 'number' && typeof b === 'number') return a - b
  return compareString(String(a), String(b))
}

const sortKeyFor = (name: string, modified: number, created: number, sortOrder: SortOrder) => {
  switch (sortOrder) {
    case 'modified':
      return modified
    case 'created':
      return created
    default:
      return name.toLowerCase()
  }
}

/** Stable: ties fall back to the lower-cased name, then to read order. */
export const sortMediaEntries = (list: readonly MediaEntry[]) => {
  const decorated = list.map((entry, index) => ({ entry, index, nameKey: entry.name.toLowerCase() }))
  decorated.sort((a, b) => {
    const keyCmp = compareSortKey(a.entry.sortKey, b.entry.sortKey)
    if (keyCmp !== 0) return keyCmp
    const nameCmp = compareString(a.nameKey, b.nameKey)
    if (nameCmp !== 0) return nameCmp
    return a.index - b.index
  })
  return decorated.map((item) => item.entry)
}

// A path that is not a directory (a file, or a file that no longer exists) scans its parent.
const resolveScanDirectory = async (path: string) => {
  const target = resolve(path)
  const info = await tryStat(target)
  return info?.isDirectory() ? target : dirname(target)
}

const toEntry = async (
  directory: string,
  dirent: Dirent,
  detector: MediaTypeDetector,
  sortOrder: SortOrder,
): Promise<MediaEntry | null> => {
  if (!dirent.isFile() && !dirent.isSymbolicLink()) return null
  const path = join(directory, dirent.name)
  const kind = detector.classify(path)
  if (kind === 'unsupported') return null
  let info: Awaited<ReturnType<typeof tryStat>>
  try {
    info = await tryStat(path)
  } catch (err) {
    console.debug('Skipping unreadable directory entry', { path, error: getErrorMessage(err) })
    return null
  }
  if (!info?.isFile()) return null
  const modified = info.mtimeMs
  const created = info.birthtimeMs
  return {
    path,
    name: basename(path),
    kind,
    sortKey: sortKeyFor(dirent.name, modified, created, sortOrder),
    modified,
    created,
  }
}

export const scanDirectory = async (
  path: string,
  sortOrder: SortOrder,
  opts: ScanOptions = {},
): Promise<DirectoryIndex> => {
  const detector = opts.detector ?? defaultMediaTypeDetector
  let directory: string
  let dirents: Dirent[]
  try {
    directory = await resolveScanDirectory(path)
    dirents = await listDirectory(directory)
  } catch (err) {
    throw new MediaIoError(path, `Cannot read directory: ${getErrorMessage(err)}`, { cause: err })
  }

  const found = await Promise.all(dirents.map((dirent) => toEntry(directory, dirent, detector, sortOrder)))
  const entries = found.filter((entry): entry is MediaEntry => entry !== null)
  return createDirectoryIndex(directory, sortMediaEntries(entries))
}

/** Path of the first media file in `directory` that passes `filter`, or `null`. */
export const scanFirstMedia = async (
  directory: string,
  sortOrder: SortOrder,
  opts: ScanOptions & { filter?: MediaFilter } = {},
) => {
  const index = await scanDirectory(directory, sortOrder, opts)
  const { filter } = opts
  const first = filter ? index.entries.find((entry) => matchesFilter(filter, entry)) : index.get(0)
  return first?.path ?? null
}
