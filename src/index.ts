export * from '@/features/navigation'
export * from '@/features/notifications'
export { getErrorMessage, normalizeError } from '@/shared/lib/error'
export type { NormalizedError } from '@/shared/lib/error'
