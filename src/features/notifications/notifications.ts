import { readonly, writable } from 'svelte/store'
import type { MessageArgs, NotificationKind } from '@/features/navigation/model/types'
import { renderMessage } from './messages'

export const DEFAULT_NOTIFICATION_DURATION_MS = 5000
const DEFAULT_MAX_VISIBLE = 5

export type Notification = {
  id: number
  kind: NotificationKind
  key: string
  args: MessageArgs
  message: string
}

type CenterOptions = {
  maxVisible?: number
}

export const createNotificationCenter = (opts: CenterOptions = {}) => {
  const maxVisible = Math.max(1, opts.maxVisible ?? DEFAULT_MAX_VISIBLE)
  const list = writable<Notification[]>([])
  const timers = new Map<number, ReturnType<typeof setTimeout>>()
  let nextId = 1

  const clearTimer = (id: number) => {
    const timer = timers.get(id)
    if (timer) clearTimeout(timer)
    timers.delete(id)
  }

  const dismiss = (id: number) => {
    clearTimer(id)
    list.update((items) => items.filter((item) => item.id !== id))
  }

  /** A `durationMs` of 0 keeps the notification until it is dismissed. */
  const emit = (
    kind: NotificationKind,
    key: string,
    args: MessageArgs = {},
    durationMs = DEFAULT_NOTIFICATION_DURATION_MS,
  ) => {
    const id = nextId++
    const entry: Notification = { id, kind, key, args: { ...args }, message: renderMessage(key, args) }
    list.update((items) => {
      const next = [...items, entry]
      const evicted = next.slice(0, Math.max(0, next.length - maxVisible))
      evicted.forEach((item) => clearTimer(item.id))
      return next.slice(next.length - Math.min(next.length, maxVisible))
    })
    if (durationMs > 0) {
      timers.set(
        id,
        setTimeout(() => {
          timers.delete(id)
          list.update((items) => items.filter((item) => item.id !== id))
        }, durationMs),
      )
    }
    return id
  }

  const clear = () => {
    timers.forEach((timer) => clearTimeout(timer))
    timers.clear()
    list.set([])
  }

  return {
    notifications: readonly(list),
    emit,
    dismiss,
    clear,
  }
}

export type NotificationCenter = ReturnType<typeof createNotificationCenter>
