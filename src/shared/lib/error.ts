export type NormalizedError = Error & {
  code?: string
  details?: unknown
  raw?: unknown
}

type ErrorLike = {
  code?: unknown
  message?: unknown
  details?: unknown
}

const asErrorLike = (value: unknown): ErrorLike | null => {
  if (!value || typeof value !== 'object') return null
  return {
    code: 'code' in value ? value.code : undefined,
    message: 'message' in value ? value.message : undefined,
    details: 'details' in value ? value.details : undefined,
  }
}

const stringify = (value: unknown): string => {
  if (typeof value === 'string') return value
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

export const normalizeError = (value: unknown): NormalizedError => {
  if (value instanceof Error) return value

  const like = asErrorLike(value)
  const message = typeof like?.message === 'string' ? like.message : stringify(value)

  const error: NormalizedError = new Error(message || 'Unknown error')
  if (typeof like?.code === 'string') error.code = like.code
  if (like && like.details !== undefined) error.details = like.details
  error.raw = value
  return error
}

export const getErrorMessage = (value: unknown): string => normalizeError(value).message
export const getErrorCode = (value: unknown): string | undefined => normalizeError(value).code

export const isNotFoundError = (value: unknown) => getErrorCode(value) === 'ENOENT'
