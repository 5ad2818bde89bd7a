import { basename } from 'node:path'
import type { MediaClass } from '../model/types'

export const IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'gif', 'tiff', 'tif', 'webp', 'bmp', 'ico', 'svg']
export const VIDEO_EXTENSIONS = ['mp4', 'm4v', 'avi', 'mov', 'mkv', 'webm']

export type MediaTypeDetector = {
  classify: (path: string) => MediaClass
}

/** Lower-cased extension without the dot; dotfiles such as `.jpg` have none. */
export const extensionOf = (path: string): string | null => {
  const name = basename(path)
  const dot = name.lastIndexOf('.')
  if (dot <= 0 || dot === name.length - 1) return null
  return name.slice(dot + 1).toLowerCase()
}

type DetectorOptions = {
  imageExtensions?: Iterable<string>
  videoExtensions?: Iterable<string>
}

export const createExtensionDetector = (opts: DetectorOptions = {}): MediaTypeDetector => {
  const images = new Set(Array.from(opts.imageExtensions ?? IMAGE_EXTENSIONS, (ext) => ext.toLowerCase()))
  const videos = new Set(Array.from(opts.videoExtensions ?? VIDEO_EXTENSIONS, (ext) => ext.toLowerCase()))

  const classify = (path: string): MediaClass => {
    const ext = extensionOf(path)
    if (!ext) return 'unsupported'
    if (images.has(ext)) return 'image'
    if (videos.has(ext)) return 'video'
    return 'unsupported'
  }

  return { classify }
}

export const defaultMediaTypeDetector = createExtensionDetector()
