import { basename } from 'node:path'
import { getErrorMessage } from '@/shared/lib/error'
import { readFileBytes } from '@/shared/lib/fs'
import { MediaDecodeError, MediaIoError } from '../model/errors'
import type { MediaPayload } from '../model/types'
import { defaultMediaTypeDetector, extensionOf, type MediaTypeDetector } from './mediaTypes'
import { matchesSignature } from './signatures'

export type LoadOptions = {
  signal?: AbortSignal
}

/** Rejects with `MediaIoError` or `MediaDecodeError`. */
export type MediaLoader = {
  load: (path: string, opts?: LoadOptions) => Promise<MediaPayload>
}

type FileLoaderOptions = {
  detector?: MediaTypeDetector
}

export const createFileMediaLoader = (opts: FileLoaderOptions = {}): MediaLoader => {
  const detector = opts.detector ?? defaultMediaTypeDetector

  const load = async (path: string, loadOpts: LoadOptions = {}): Promise<MediaPayload> => {
    const name = basename(path)
    const kind = detector.classify(path)
    if (kind === 'unsupported') {
      throw new MediaDecodeError(path, `Unsupported media type: ${name}`)
    }

    let bytes: Uint8Array
    try {
      bytes = await readFileBytes(path, loadOpts.signal)
    } catch (err) {
      throw new MediaIoError(path, `Cannot read ${name}: ${getErrorMessage(err)}`, { cause: err })
    }

    if (bytes.length === 0) {
      throw new MediaDecodeError(path, `Empty file: ${name}`)
    }
    const ext = extensionOf(path)
    if (ext && !matchesSignature(ext, bytes)) {
      throw new MediaDecodeError(path, `Unrecognized ${ext} data: ${name}`)
    }
    return { path, kind, bytes }
  }

  return { load }
}
