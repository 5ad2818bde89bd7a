import type { DirectoryIndex, MediaEntry } from '../model/types'

/** Freezes `entries` in the given order; a repeated path keeps its first slot. */
export const createDirectoryIndex = (directory: string, entries: readonly MediaEntry[]): DirectoryIndex => {
  const positions = new Map<string, number>()
  const unique: MediaEntry[] = []
  for (const entry of entries) {
    if (positions.has(entry.path)) continue
    positions.set(entry.path, unique.length)
    unique.push(Object.freeze({ ...entry }))
  }
  const frozen = Object.freeze(unique)

  return Object.freeze({
    directory,
    entries: frozen,
    length: frozen.length,
    get: (index: number) => (Number.isInteger(index) ? frozen[index] : undefined),
    indexOf: (path: string) => positions.get(path) ?? -1,
  })
}

export const emptyDirectoryIndex = (directory = '') => createDirectoryIndex(directory, [])
