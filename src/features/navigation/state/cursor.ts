import { derived, get, readonly, writable } from 'svelte/store'
import type {
  CursorPosition,
  Direction,
  DirectoryIndex,
  MediaEntry,
  MediaFilter,
  NavigationInfo,
} from '../model/types'
import { emptyDirectoryIndex } from './directoryIndex'
import { emptyMediaFilter, isFilterActive, matchesFilter } from './filter'

const step = (from: number, offset: number, length: number, direction: Direction) =>
  direction === 'next'
    ? (from + offset) % length
    : (((from - offset) % length) + length) % length

const toSteps = (value: number) => (Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : 0)

const pathAt = (list: DirectoryIndex, position: CursorPosition) => {
  switch (position.type) {
    case 'indexed':
      return list.get(position.index)?.path ?? null
    case 'unresolved':
      return position.path
    default:
      return null
  }
}

const resolvePosition = (list: DirectoryIndex, path: string | null): CursorPosition => {
  if (path === null) return { type: 'empty' }
  const index = list.indexOf(path)
  return index >= 0 ? { type: 'indexed', index } : { type: 'unresolved', path }
}

const samePosition = (a: CursorPosition, b: CursorPosition) => {
  if (a.type === 'indexed' && b.type === 'indexed') return a.index === b.index
  if (a.type === 'unresolved' && b.type === 'unresolved') return a.path === b.path
  return a.type === b.type
}

const buildInfo = (list: DirectoryIndex, position: CursorPosition, filter: MediaFilter): NavigationInfo => {
  const currentIndex = position.type === 'indexed' ? position.index : null
  const totalCount = list.length
  const filterActive = isFilterActive(filter)
  return {
    hasNext: totalCount > 0,
    hasPrevious: totalCount > 0,
    atFirst: currentIndex === 0,
    atLast: totalCount > 0 && currentIndex === totalCount - 1,
    currentIndex,
    totalCount,
    filteredCount: filterActive
      ? list.entries.filter((entry) => matchesFilter(filter, entry)).length
      : totalCount,
    filterActive,
  }
}

/**
 * Position within a directory index. The `peekNth*` queries take a step
 * count: 1 is the neighbour. Peeks never move the cursor; only
 * `confirmNavigation` (or the `navigate*` shorthands) do.
 */
export const createNavigationCursor = (initialPath: string | null = null) => {
  const index = writable<DirectoryIndex>(emptyDirectoryIndex())
  const position = writable<CursorPosition>(
    initialPath ? { type: 'unresolved', path: initialPath } : { type: 'empty' },
  )
  const filter = writable<MediaFilter>(emptyMediaFilter())

  const currentPath = derived([index, position], ([$index, $position]) => pathAt($index, $position))
  const info = derived([index, position, filter], ([$index, $position, $filter]) =>
    buildInfo($index, $position, $filter),
  )

  const currentIndex = () => {
    const $position = get(position)
    return $position.type === 'indexed' ? $position.index : null
  }

  // Without a resolved position, `next` counts from just before the first entry
  // and `previous` from just after the last.
  const peekNth = (direction: Direction, n: number) => {
    const list = get(index)
    if (list.length === 0) return null
    const steps = toSteps(n)
    const from = currentIndex()
    if (from === null) {
      if (steps < 1) return null
      const start = direction === 'next' ? 0 : list.length - 1
      return list.get(step(start, steps - 1, list.length, direction))?.path ?? null
    }
    return list.get(step(from, steps, list.length, direction))?.path ?? null
  }

  // The n-th matching entry; walks at most one full lap, so the current entry is the last candidate.
  const peekNthMatching = (
    direction: Direction,
    n: number,
    predicate: (entry: MediaEntry) => boolean,
  ) => {
    const list = get(index)
    const from = currentIndex()
    const steps = toSteps(n)
    if (from === null || list.length === 0 || steps < 1) return null
    let found = 0
    for (let offset = 1; offset <= list.length; offset++) {
      const entry = list.get(step(from, offset, list.length, direction))
      if (!entry || !predicate(entry)) continue
      found += 1
      if (found === steps) return entry.path
    }
    return null
  }

  const isImage = (entry: MediaEntry) => entry.kind === 'image'

  const peekNthFiltered = (direction: Direction, n: number) => {
    const $filter = get(filter)
    if (!isFilterActive($filter)) return peekNth(direction, n)
    return peekNthMatching(direction, n, (entry) => matchesFilter($filter, entry))
  }

  const confirmNavigation = (path: string) => {
    const next = resolvePosition(get(index), path)
    if (samePosition(get(position), next)) return
    position.set(next)
  }

  /** Installs a fresh index and re-resolves the current path against it. */
  const setIndex = (list: DirectoryIndex) => {
    const path = pathAt(get(index), get(position))
    index.set(list)
    const next = resolvePosition(list, path)
    if (!samePosition(get(position), next)) position.set(next)
  }

  const navigate = (direction: Direction) => {
    const path = peekNth(direction, 1)
    if (path !== null) confirmNavigation(path)
    return path
  }

  const currentMatchesFilter = () => {
    const $filter = get(filter)
    if (!isFilterActive($filter)) return pathAt(get(index), get(position)) !== null
    const at = currentIndex()
    const entry = at === null ? undefined : get(index).get(at)
    return entry ? matchesFilter($filter, entry) : false
  }

  return {
    index: readonly(index),
    position: readonly(position),
    filter: readonly(filter),
    currentPath,
    info,
    current: () => get(currentPath),
    peekNext: () => peekNth('next', 1),
    peekPrevious: () => peekNth('previous', 1),
    peekNthNext: (n: number) => peekNth('next', n),
    peekNthPrevious: (n: number) => peekNth('previous', n),
    peekNthNextImage: (n: number) => peekNthMatching('next', n, isImage),
    peekNthPreviousImage: (n: number) => peekNthMatching('previous', n, isImage),
    peekNthNextFiltered: (n: number) => peekNthFiltered('next', n),
    peekNthPreviousFiltered: (n: number) => peekNthFiltered('previous', n),
    confirmNavigation,
    setIndex,
    setFilter: (value: MediaFilter) => filter.set(value),
    clearFilter: () => filter.set(emptyMediaFilter()),
    navigateNext: () => navigate('next'),
    navigatePrevious: () => navigate('previous'),
    navigationInfo: () => buildInfo(get(index), get(position), get(filter)),
    currentMatchesFilter,
  }
}

export type NavigationCursor = ReturnType<typeof createNavigationCursor>
