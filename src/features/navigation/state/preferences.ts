import { get, readonly, writable } from 'svelte/store'
import { clampMaxSkipAttempts, DEFAULT_MAX_SKIP_ATTEMPTS } from '../model/skipAttempts'
import { DEFAULT_SORT_ORDER, isSortOrder, type SortOrder } from '../model/types'
import { createMemorySettingsBackend, createNavigationSettings, type SettingsBackend } from '../services/settings'

export const createNavigationPreferences = (backend: SettingsBackend = createMemorySettingsBackend()) => {
  const settings = createNavigationSettings(backend)
  const sortOrder = writable<SortOrder>(DEFAULT_SORT_ORDER)
  const maxSkipAttempts = writable(DEFAULT_MAX_SKIP_ATTEMPTS)

  const persist = (task: Promise<void>, name: string) => {
    void task.catch((err) => {
      console.error(`Failed to store ${name} setting`, err)
    })
  }

  const setSortOrderPref = (value: SortOrder) => {
    if (get(sortOrder) === value) return
    sortOrder.set(value)
    persist(settings.storeSortOrder(value), 'sortOrder')
  }

  const setMaxSkipAttemptsPref = (value: number) => {
    const next = clampMaxSkipAttempts(value)
    if (get(maxSkipAttempts) === next) return
    maxSkipAttempts.set(next)
    persist(settings.storeMaxSkipAttempts(next), 'maxSkipAttempts')
  }

  // Unknown stored values are replaced with the default.
  const loadSortOrderPref = async () => {
    try {
      const saved = await settings.loadSortOrder()
      if (isSortOrder(saved)) {
        sortOrder.set(saved)
      } else if (saved !== null) {
        sortOrder.set(DEFAULT_SORT_ORDER)
        await settings.storeSortOrder(DEFAULT_SORT_ORDER)
      }
    } catch (err) {
      console.error('Failed to load sortOrder setting', err)
    }
  }

  const loadMaxSkipAttemptsPref = async () => {
    try {
      const saved = await settings.loadMaxSkipAttempts()
      if (typeof saved === 'number' && Number.isFinite(saved)) {
        const clamped = clampMaxSkipAttempts(saved)
        maxSkipAttempts.set(clamped)
        if (clamped !== saved) await settings.storeMaxSkipAttempts(clamped)
      } else if (saved !== null) {
        maxSkipAttempts.set(DEFAULT_MAX_SKIP_ATTEMPTS)
        await settings.storeMaxSkipAttempts(DEFAULT_MAX_SKIP_ATTEMPTS)
      }
    } catch (err) {
      console.error('Failed to load maxSkipAttempts setting', err)
    }
  }

  const loadPreferences = async () => {
    await Promise.all([loadSortOrderPref(), loadMaxSkipAttemptsPref()])
  }

  return {
    sortOrder: readonly(sortOrder),
    maxSkipAttempts: readonly(maxSkipAttempts),
    setSortOrderPref,
    setMaxSkipAttemptsPref,
    loadSortOrderPref,
    loadMaxSkipAttemptsPref,
    loadPreferences,
  }
}

export type NavigationPreferences = ReturnType<typeof createNavigationPreferences>
