export const MIN_SKIP_ATTEMPTS = 1
export const MAX_SKIP_ATTEMPTS = 20
export const DEFAULT_MAX_SKIP_ATTEMPTS = 5

export const clampMaxSkipAttempts = (value: number) => {
  if (!Number.isFinite(value)) return DEFAULT_MAX_SKIP_ATTEMPTS
  return Math.min(MAX_SKIP_ATTEMPTS, Math.max(MIN_SKIP_ATTEMPTS, Math.trunc(value)))
}
