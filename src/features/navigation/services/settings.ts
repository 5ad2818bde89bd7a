import { getErrorMessage } from '@/shared/lib/error'
import { readTextFile, writeTextFile } from '@/shared/lib/fs'
import type { SortOrder } from '../model/types'

export type SettingsBackend = {
  load: (key: string) => Promise<unknown>
  store: (key: string, value: unknown) => Promise<void>
}

const SORT_ORDER_KEY = 'sort_order'
const MAX_SKIP_ATTEMPTS_KEY = 'max_skip_attempts'

export const createMemorySettingsBackend = (initial: Record<string, unknown> = {}): SettingsBackend => {
  const values = new Map(Object.entries(initial))
  return {
    load: async (key) => values.get(key) ?? null,
    store: async (key, value) => {
      values.set(key, value)
    },
  }
}

const parseSettings = (text: string | null): Record<string, unknown> => {
  if (text === null || text.trim() === '') return {}
  const parsed: unknown = JSON.parse(text)
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return {}
  return Object.fromEntries(Object.entries(parsed))
}

/** JSON object on disk; writes are serialized so concurrent stores do not drop keys. */
export const createFileSettingsBackend = (filePath: string): SettingsBackend => {
  let pending: Promise<void> = Promise.resolve()

  const readAll = async () => parseSettings(await readTextFile(filePath))

  const load = async (key: string) => {
    await pending
    const values = await readAll()
    return values[key] ?? null
  }

  // A document that no longer parses is replaced rather than blocking every write.
  const readForWrite = async () => {
    const text = await readTextFile(filePath)
    try {
      return parseSettings(text)
    } catch (err) {
      console.warn('Replacing unreadable settings file', { path: filePath, error: getErrorMessage(err) })
      return {}
    }
  }

  const store = (key: string, value: unknown) => {
    const task = pending.then(async () => {
      const values = await readForWrite()
      values[key] = value
      await writeTextFile(filePath, `${JSON.stringify(values, null, 2)}\n`)
    })
    pending = task.catch(() => undefined)
    return task
  }

  return { load, store }
}

export const createNavigationSettings = (backend: SettingsBackend) => ({
  loadSortOrder: () => backend.load(SORT_ORDER_KEY),
  storeSortOrder: (value: SortOrder) => backend.store(SORT_ORDER_KEY, value),
  loadMaxSkipAttempts: () => backend.load(MAX_SKIP_ATTEMPTS_KEY),
  storeMaxSkipAttempts: (value: number) => backend.store(MAX_SKIP_ATTEMPTS_KEY, value),
})
