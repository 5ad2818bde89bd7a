type SignaturePart = { offset: number; bytes: readonly number[] }
/** Every part must match. */
type Signature = readonly SignaturePart[]

const ascii = (text: string) => Array.from(text, (char) => char.charCodeAt(0))
const at = (offset: number, bytes: readonly number[]): SignaturePart => ({ offset, bytes })

const JPEG: Signature[] = [[at(0, [0xff, 0xd8, 0xff])]]
const TIFF: Signature[] = [[at(0, [0x49, 0x49, 0x2a, 0x00])], [at(0, [0x4d, 0x4d, 0x00, 0x2a])]]
const ISO_MEDIA: Signature[] = [[at(4, ascii('ftyp'))]]
const QUICKTIME: Signature[] = ['ftyp', 'moov', 'mdat', 'wide', 'free'].map((box) => [at(4, ascii(box))])
const EBML: Signature[] = [[at(0, [0x1a, 0x45, 0xdf, 0xa3])]]

const SIGNATURES = new Map<string, Signature[]>([
  ['jpg', JPEG],
  ['jpeg', JPEG],
  ['png', [[at(0, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])]]],
  ['gif', [[at(0, ascii('GIF87a'))], [at(0, ascii('GIF89a'))]]],
  ['bmp', [[at(0, ascii('BM'))]]],
  ['webp', [[at(0, ascii('RIFF')), at(8, ascii('WEBP'))]]],
  ['tiff', TIFF],
  ['tif', TIFF],
  ['ico', [[at(0, [0x00, 0x00, 0x01, 0x00])]]],
  ['mp4', ISO_MEDIA],
  ['m4v', ISO_MEDIA],
  ['mov', QUICKTIME],
  ['mkv', EBML],
  ['webm', EBML],
  ['avi', [[at(0, ascii('RIFF')), at(8, ascii('AVI '))]]],
])

const SVG_SNIFF_BYTES = 4096

const partMatches = (data: Uint8Array, part: SignaturePart) =>
  data.length >= part.offset + part.bytes.length &&
  part.bytes.every((byte, i) => data[part.offset + i] === byte)

const looksLikeSvg = (data: Uint8Array) =>
  new TextDecoder().decode(data.subarray(0, SVG_SNIFF_BYTES)).toLowerCase().includes('<svg')

/**
 * Checks the leading bytes against the container signature for `ext`.
 * Extensions without a known signature pass.
 */
export const matchesSignature = (ext: string, data: Uint8Array) => {
  if (ext === 'svg') return looksLikeSvg(data)
  const candidates = SIGNATURES.get(ext)
  if (!candidates) return true
  return candidates.some((signature) => signature.every((part) => partMatches(data, part)))
}
