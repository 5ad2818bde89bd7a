import { writable, type Readable } from 'svelte/store'

export const LOADING_DELAY_MS = 150
export const LOADING_MIN_VISIBLE_MS = 180

type IndicatorOptions = {
  delayMs?: number
  minVisibleMs?: number
}

export type LoadingIndicator = Readable<boolean> & {
  request: (busy: boolean) => void
  dispose: () => void
}

/**
 * Busy flag for the viewer spinner. Loads that finish within `delayMs` never
 * show it; once shown it stays up for at least `minVisibleMs`.
 */
export const createLoadingIndicator = (opts: IndicatorOptions = {}): LoadingIndicator => {
  const delayMs = opts.delayMs ?? LOADING_DELAY_MS
  const minVisibleMs = opts.minVisibleMs ?? LOADING_MIN_VISIBLE_MS
  const visible = writable(false)
  let busy = false
  let shown = false
  let shownAt = 0
  let showTimer: ReturnType<typeof setTimeout> | null = null
  let hideTimer: ReturnType<typeof setTimeout> | null = null

  const clearTimers = () => {
    if (showTimer) clearTimeout(showTimer)
    if (hideTimer) clearTimeout(hideTimer)
    showTimer = null
    hideTimer = null
  }

  const show = (next: boolean) => {
    shown = next
    shownAt = next ? Date.now() : 0
    visible.set(next)
  }

  const request = (next: boolean) => {
    busy = next
    if (next) {
      if (hideTimer) clearTimeout(hideTimer)
      hideTimer = null
      if (shown || showTimer) return
      showTimer = setTimeout(() => {
        showTimer = null
        if (busy && !shown) show(true)
      }, delayMs)
      return
    }

    if (showTimer) clearTimeout(showTimer)
    showTimer = null
    if (!shown || hideTimer) return
    const remaining = Math.max(0, minVisibleMs - (Date.now() - shownAt))
    if (remaining === 0) {
      show(false)
      return
    }
    hideTimer = setTimeout(() => {
      hideTimer = null
      if (!busy) show(false)
    }, remaining)
  }

  const dispose = () => {
    clearTimers()
    busy = false
    if (shown) show(false)
  }

  return { subscribe: visible.subscribe, request, dispose }
}
