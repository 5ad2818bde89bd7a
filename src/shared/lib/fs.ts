import { mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises'
import type { Stats } from 'node:fs'
import { dirname } from 'node:path'
import { isNotFoundError, normalizeError } from './error'

const call = async <T>(task: () => Promise<T>): Promise<T> => {
  try {
    return await task()
  } catch (error) {
    throw normalizeError(error)
  }
}

export const listDirectory = (path: string) => call(() => readdir(path, { withFileTypes: true }))

export const statPath = (path: string) => call(() => stat(path))

/** Like `statPath`, but a missing path resolves to `null`. */
export const tryStat = async (path: string): Promise<Stats | null> => {
  try {
    return await stat(path)
  } catch (error) {
    if (isNotFoundError(error)) return null
    throw normalizeError(error)
  }
}

export const readFileBytes = (path: string, signal?: AbortSignal): Promise<Uint8Array> =>
  call(() => readFile(path, { signal }))

export const readTextFile = async (path: string): Promise<string | null> => {
  try {
    return await readFile(path, 'utf8')
  } catch (error) {
    if (isNotFoundError(error)) return null
    throw normalizeError(error)
  }
}

export const writeTextFile = (path: string, contents: string) =>
  call(async () => {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, contents, 'utf8')
  })
