import { getErrorCode, getErrorMessage } from '@/shared/lib/error'

export class MediaIoError extends Error {
  readonly code = 'io'
  readonly path: string

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'MediaIoError'
    this.path = path
  }
}

export class MediaDecodeError extends Error {
  readonly code = 'decode'
  readonly path: string

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'MediaDecodeError'
    this.path = path
  }
}

export type MediaLoadError = MediaIoError | MediaDecodeError

const isErrno = (code: string | undefined) => typeof code === 'string' && /^E[A-Z]+$/.test(code)

/** Any non-errno failure from a loader counts as undecodable content. */
export const toMediaLoadError = (path: string, error: unknown): MediaLoadError => {
  if (error instanceof MediaIoError || error instanceof MediaDecodeError) return error
  const message = getErrorMessage(error)
  if (isErrno(getErrorCode(error))) return new MediaIoError(path, message, { cause: error })
  return new MediaDecodeError(path, message, { cause: error })
}
