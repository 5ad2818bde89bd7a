import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { get } from 'svelte/store'
import { MediaDecodeError } from '../model/errors'
import type { MediaPayload } from '../model/types'
import { createNavigationCursor } from './cursor'
import { createLoadOrchestrator } from './orchestrator'
import { createPrefetchCache } from './prefetch'
import { buildIndex } from './testing'

const DIR = '/photos'
const p = (name: string) => `${DIR}/${name}`

const payload = (path: string): MediaPayload => ({ path, kind: 'image', bytes: new Uint8Array([1]) })

type SetupOptions = {
  bad?: string[]
  max?: number
  signal?: AbortSignal
}

const setup = (names: string[], current: string | null, opts: SetupOptions = {}) => {
  const bad = new Set((opts.bad ?? []).map(p))
  let listing = buildIndex(DIR, names)
  const cursor = createNavigationCursor(current === null ? null : p(current))
  cursor.setIndex(listing)
  const loader = {
    load: vi.fn(async (path: string) => {
      if (bad.has(path)) throw new MediaDecodeError(path, 'corrupt')
      return payload(path)
    }),
  }
  const notify = vi.fn()
  const scan = vi.fn(async () => listing)
  const orchestrator = createLoadOrchestrator({
    cursor,
    loader,
    notify,
    scan,
    getMaxSkipAttempts: () => opts.max ?? 5,
    signal: opts.signal,
  })
  const loadedPaths = () => loader.load.mock.calls.map(([path]) => path)
  const setListing = (next: string[]) => {
    listing = buildIndex(DIR, next)
  }
  return { cursor, loader, notify, scan, orchestrator, loadedPaths, setListing }
}

type Deferred = { resolve: (value: MediaPayload) => void; reject: (err: unknown) => void }

const deferredLoader = () => {
  const pending = new Map<string, Deferred>()
  const load = vi.fn(
    (path: string) =>
      new Promise<MediaPayload>((resolve, reject) => {
        pending.set(path, { resolve, reject })
      }),
  )
  return { load, pending }
}

beforeEach(() => {
  vi.spyOn(console, 'debug').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('navigation gestures', () => {
  it('loads the next entry and then confirms it', async () => {
    const { cursor, notify, orchestrator, loadedPaths } = setup(['a.jpg', 'b.jpg', 'c.jpg'], 'a.jpg')
    const states: string[] = []
    const unsubscribe = orchestrator.state.subscribe((state) => states.push(state.type))

    await orchestrator.navigate('next')
    unsubscribe()

    expect(loadedPaths()).toEqual([p('b.jpg')])
    expect(cursor.current()).toBe(p('b.jpg'))
    expect(states).toEqual(['idle', 'loading', 'idle'])
    expect(orchestrator.isIdle()).toBe(true)
    expect(notify).not.toHaveBeenCalled()
  })

  it('skips an undecodable file and reports it once', async () => {
    const { cursor, notify, scan, orchestrator, loadedPaths } = setup(['a.jpg', 'b.jpg', 'c.jpg'], 'c.jpg', {
      bad: ['a.jpg'],
    })

    await orchestrator.navigateNext()

    expect(loadedPaths()).toEqual([p('a.jpg'), p('b.jpg')])
    expect(cursor.current()).toBe(p('b.jpg'))
    expect(scan).toHaveBeenCalledTimes(1)
    expect(notify).toHaveBeenCalledTimes(1)
    expect(notify).toHaveBeenCalledWith(
      'warning',
      'notification-skipped-corrupted-files',
      { files: 'a.jpg', count: '1' },
      8000,
    )
  })

  it('wraps back to the current entry when every other file fails', async () => {
    const { cursor, notify, orchestrator, loadedPaths } = setup(['a.jpg', 'b.jpg', 'c.jpg'], 'a.jpg', {
      bad: ['b.jpg', 'c.jpg'],
    })

    await orchestrator.navigate('next')

    expect(loadedPaths()).toEqual([p('b.jpg'), p('c.jpg'), p('a.jpg')])
    expect(cursor.current()).toBe(p('a.jpg'))
    expect(notify).toHaveBeenCalledWith(
      'warning',
      'notification-skipped-corrupted-files',
      { files: 'b.jpg, c.jpg', count: '2' },
      8000,
    )
  })

  it('gives up after the configured number of skips without moving', async () => {
    const { cursor, notify, orchestrator, loadedPaths } = setup(
      ['cur.jpg', 'b1.jpg', 'b2.jpg', 'b3.jpg', 'ok.jpg'],
      'cur.jpg',
      { bad: ['b1.jpg', 'b2.jpg', 'b3.jpg'], max: 2 },
    )

    await orchestrator.navigate('next')

    expect(loadedPaths()).toEqual([p('b1.jpg'), p('b2.jpg'), p('b3.jpg')])
    expect(cursor.current()).toBe(p('cur.jpg'))
    expect(orchestrator.isIdle()).toBe(true)
    expect(notify).toHaveBeenCalledTimes(1)
    expect(notify).toHaveBeenCalledWith(
      'warning',
      'notification-skipped-corrupted-files',
      { files: 'b1.jpg, b2.jpg, b3.jpg', count: '3' },
      8000,
    )
  })

  it('wraps a single entry onto itself in both directions', async () => {
    const { cursor, orchestrator, loadedPaths } = setup(['a.jpg'], 'a.jpg')
    await orchestrator.navigate('next')
    await orchestrator.navigate('previous')
    expect(loadedPaths()).toEqual([p('a.jpg'), p('a.jpg')])
    expect(cursor.current()).toBe(p('a.jpg'))
  })

  it('does nothing in a directory that became empty', async () => {
    const { cursor, notify, orchestrator, loadedPaths, setListing } = setup(['a.jpg', 'b.jpg'], 'a.jpg')
    setListing([])

    await orchestrator.navigate('next')

    expect(loadedPaths()).toEqual([])
    expect(cursor.current()).toBe(p('a.jpg'))
    expect(orchestrator.isIdle()).toBe(true)
    expect(notify).not.toHaveBeenCalled()
  })

  it('follows the rescanned listing', async () => {
    const { cursor, orchestrator, setListing } = setup(['a.jpg', 'b.jpg', 'c.jpg'], 'b.jpg')
    setListing(['b.jpg', 'c.jpg', 'd.jpg'])
    await orchestrator.navigate('next')
    expect(cursor.current()).toBe(p('c.jpg'))
  })

  it('starts from the ends when the current file was removed', async () => {
    const { cursor, orchestrator, setListing } = setup(['a.jpg', 'b.jpg', 'c.jpg'], 'b.jpg')
    setListing(['a.jpg', 'c.jpg'])
    await orchestrator.navigate('previous')
    expect(cursor.current()).toBe(p('c.jpg'))
  })

  it('keeps the previous index when the rescan fails', async () => {
    const { cursor, scan, orchestrator } = setup(['a.jpg', 'b.jpg'], 'a.jpg')
    scan.mockRejectedValueOnce(new Error('EACCES'))
    await orchestrator.navigate('next')
    expect(cursor.current()).toBe(p('b.jpg'))
    expect(console.warn).toHaveBeenCalledWith('Rescan failed, keeping previous index', {
      path: p('a.jpg'),
      error: 'EACCES',
    })
  })

  it('visits only images in image mode', async () => {
    const { cursor, orchestrator, loadedPaths } = setup(['a.jpg', 'clip.mp4', 'c.jpg'], 'a.jpg')
    await orchestrator.navigate('next', 'images')
    expect(loadedPaths()).toEqual([p('c.jpg')])
    expect(cursor.current()).toBe(p('c.jpg'))
  })

  it('honours the active filter', async () => {
    const { cursor, orchestrator } = setup(['a.jpg', 'clip.mp4', 'c.jpg', 'd.mp4'], 'clip.mp4')
    cursor.setFilter({ mediaType: 'videos', dateRange: null })
    await orchestrator.navigate('next')
    expect(cursor.current()).toBe(p('d.mp4'))
  })
})

describe('direct open', () => {
  it('installs the directory and confirms the opened file', async () => {
    const { cursor, scan, orchestrator } = setup(['a.jpg', 'b.jpg'], null)
    await orchestrator.open(p('b.jpg'))
    expect(scan).toHaveBeenCalledWith(p('b.jpg'), 'alphabetical')
    expect(get(cursor.position)).toEqual({ type: 'indexed', index: 1 })
  })

  it('reports a failed open without skipping or moving', async () => {
    const { cursor, notify, orchestrator, loadedPaths } = setup(['a.jpg', 'b.jpg', 'c.jpg'], 'a.jpg', {
      bad: ['b.jpg'],
    })

    await orchestrator.open(p('b.jpg'))

    expect(loadedPaths()).toEqual([p('b.jpg')])
    expect(cursor.current()).toBe(p('a.jpg'))
    expect(get(orchestrator.lastError)).toBe('corrupt')
    expect(notify).toHaveBeenCalledTimes(1)
    expect(notify).toHaveBeenCalledWith('error', 'error-media-load-failed', { filename: 'b.jpg' })
  })

  it('reports unreadable directories', async () => {
    const { notify, scan, orchestrator, loadedPaths } = setup(['a.jpg'], null)
    scan.mockRejectedValueOnce(new Error('EACCES'))
    await orchestrator.open(p('a.jpg'))
    expect(loadedPaths()).toEqual([])
    expect(notify).toHaveBeenCalledWith('error', 'error-directory-read-failed', { directory: 'photos' })
  })

  it('opens the first matching file of a directory', async () => {
    const { cursor, orchestrator } = setup(['clip.mp4', 'b.jpg'], null)
    cursor.setFilter({ mediaType: 'images', dateRange: null })
    expect(await orchestrator.openDirectory(DIR)).toBe(p('b.jpg'))
    expect(cursor.current()).toBe(p('b.jpg'))
  })

  it('resolves null when the first file of a directory fails to load', async () => {
    const { cursor, notify, orchestrator } = setup(['b.jpg'], null, { bad: ['b.jpg'] })
    expect(await orchestrator.openDirectory(DIR)).toBeNull()
    expect(cursor.current()).toBeNull()
    expect(notify).toHaveBeenCalledWith('error', 'error-media-load-failed', { filename: 'b.jpg' })
  })

  it('reports whether a direct open was confirmed', async () => {
    const { orchestrator } = setup(['a.jpg', 'b.jpg'], null, { bad: ['b.jpg'] })
    expect(await orchestrator.open(p('a.jpg'))).toBe(true)
    expect(await orchestrator.open(p('b.jpg'))).toBe(false)
  })

  it('announces empty directories', async () => {
    const { notify, orchestrator } = setup([], null)
    expect(await orchestrator.openDirectory(DIR)).toBeNull()
    expect(notify).toHaveBeenCalledWith('info', 'notification-empty-directory', { directory: 'photos' })
  })
})

describe('concurrency', () => {
  it('lets a newer gesture supersede an unfinished one', async () => {
    const cursor = createNavigationCursor(p('a.jpg'))
    const listing = buildIndex(DIR, ['a.jpg', 'b.jpg', 'c.jpg', 'd.jpg'])
    cursor.setIndex(listing)
    const loader = deferredLoader()
    const notify = vi.fn()
    const orchestrator = createLoadOrchestrator({ cursor, loader, notify, scan: async () => listing })

    const first = orchestrator.navigate('next')
    await vi.waitFor(() => expect(loader.load).toHaveBeenCalledTimes(1))
    const second = orchestrator.navigate('previous')
    await vi.waitFor(() => expect(loader.load).toHaveBeenCalledTimes(2))

    loader.pending.get(p('d.jpg'))?.resolve(payload(p('d.jpg')))
    await second
    loader.pending.get(p('b.jpg'))?.reject(new MediaDecodeError(p('b.jpg'), 'corrupt'))
    await first

    expect(loader.load.mock.calls.map(([path]) => path)).toEqual([p('b.jpg'), p('d.jpg')])
    expect(cursor.current()).toBe(p('d.jpg'))
    expect(notify).not.toHaveBeenCalled()
    expect(orchestrator.isIdle()).toBe(true)
  })

  it('drops results that arrive after shutdown', async () => {
    const controller = new AbortController()
    const cursor = createNavigationCursor(p('a.jpg'))
    const listing = buildIndex(DIR, ['a.jpg', 'b.jpg'])
    cursor.setIndex(listing)
    const loader = deferredLoader()
    const notify = vi.fn()
    const onLoaded = vi.fn()
    const orchestrator = createLoadOrchestrator({
      cursor,
      loader,
      notify,
      onLoaded,
      scan: async () => listing,
      signal: controller.signal,
    })

    const gesture = orchestrator.navigate('next')
    await vi.waitFor(() => expect(loader.load).toHaveBeenCalledTimes(1))
    controller.abort()
    loader.pending.get(p('b.jpg'))?.resolve(payload(p('b.jpg')))
    await gesture

    expect(cursor.current()).toBe(p('a.jpg'))
    expect(onLoaded).not.toHaveBeenCalled()

    await orchestrator.navigate('next')
    expect(loader.load).toHaveBeenCalledTimes(1)
  })

  it('cancels the gesture in flight', async () => {
    const cursor = createNavigationCursor(p('a.jpg'))
    const listing = buildIndex(DIR, ['a.jpg', 'b.jpg'])
    cursor.setIndex(listing)
    const loader = deferredLoader()
    const orchestrator = createLoadOrchestrator({ cursor, loader, notify: vi.fn(), scan: async () => listing })

    const gesture = orchestrator.navigate('next')
    await vi.waitFor(() => expect(loader.load).toHaveBeenCalledTimes(1))
    orchestrator.cancel()
    expect(orchestrator.isIdle()).toBe(true)
    loader.pending.get(p('b.jpg'))?.resolve(payload(p('b.jpg')))
    await gesture
    expect(cursor.current()).toBe(p('a.jpg'))
  })
})

describe('prefetch', () => {
  it('never warms video neighbours', async () => {
    const cursor = createNavigationCursor(p('a.jpg'))
    const listing = buildIndex(DIR, ['a.jpg', 'b.jpg', 'huge.mp4'])
    cursor.setIndex(listing)
    const loader = { load: vi.fn(async (path: string) => payload(path)) }
    const prefetch = createPrefetchCache({ loader })
    const orchestrator = createLoadOrchestrator({
      cursor,
      loader,
      prefetch,
      notify: vi.fn(),
      scan: async () => listing,
    })

    await orchestrator.navigate('next')
    await vi.waitFor(() => expect(prefetch.pending()).toBe(0))

    expect(loader.load.mock.calls.map(([path]) => path)).toEqual([p('b.jpg'), p('a.jpg')])
    expect(prefetch.has(p('a.jpg'))).toBe(true)
  })

  it('warms neighbours and serves the next load from the cache', async () => {
    const cursor = createNavigationCursor(p('a.jpg'))
    const listing = buildIndex(DIR, ['a.jpg', 'b.jpg', 'c.jpg'])
    cursor.setIndex(listing)
    const loader = { load: vi.fn(async (path: string) => payload(path)) }
    const prefetch = createPrefetchCache({ loader })
    const onLoaded = vi.fn()
    const orchestrator = createLoadOrchestrator({
      cursor,
      loader,
      prefetch,
      onLoaded,
      notify: vi.fn(),
      scan: async () => listing,
    })

    await orchestrator.navigate('next')
    await vi.waitFor(() => expect(prefetch.size()).toBe(2))
    await orchestrator.navigate('next')

    expect(loader.load.mock.calls.map(([path]) => path)).toEqual([p('b.jpg'), p('c.jpg'), p('a.jpg'), p('b.jpg')])
    expect(cursor.current()).toBe(p('c.jpg'))
    expect(onLoaded).toHaveBeenLastCalledWith(payload(p('c.jpg')))
  })
})
