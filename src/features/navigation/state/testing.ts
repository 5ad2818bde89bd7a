import type { MediaEntry, MediaKind } from '../model/types'
import { createDirectoryIndex } from './directoryIndex'

const kindOf = (name: string): MediaKind => (/\.(mp4|mkv|webm|mov|avi|m4v)$/i.test(name) ? 'video' : 'image')

export const mediaEntry = (directory: string, name: string, overrides: Partial<MediaEntry> = {}): MediaEntry => ({
  path: `${directory}/${name}`,
  name,
  kind: kindOf(name),
  sortKey: name.toLowerCase(),
  modified: 0,
  created: 0,
  ...overrides,
})

/** Index of `names` under `directory`, in the given order. */
export const buildIndex = (directory: string, names: string[]) =>
  createDirectoryIndex(
    directory,
    names.map((name) => mediaEntry(directory, name)),
  )
