import type { MessageArgs } from '@/features/navigation/model/types'

export const SKIPPED_FILES_KEY = 'notification-skipped-corrupted-files'
export const LOAD_FAILED_KEY = 'error-media-load-failed'
export const DIRECTORY_READ_FAILED_KEY = 'error-directory-read-failed'
export const EMPTY_DIRECTORY_KEY = 'notification-empty-directory'

const catalog = new Map<string, string>([
  [SKIPPED_FILES_KEY, 'Skipped unreadable files: {files}'],
  [LOAD_FAILED_KEY, 'Could not open {filename}'],
  [DIRECTORY_READ_FAILED_KEY, 'Could not read folder {directory}'],
  [EMPTY_DIRECTORY_KEY, 'No media files in {directory}'],
])

/** Unknown keys render as themselves; unknown placeholders stay in place. */
export const renderMessage = (key: string, args: MessageArgs = {}) => {
  const template = catalog.get(key) ?? key
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.hasOwn(args, name) ? args[name] : match,
  )
}
