import { DeliveryError } from '@/lib/errors'

const MAX_BASENAME_LENGTH = 120
const SAFE_FILENAME = /^[\p{L}\p{M}\p{N}_-][\p{L}\p{M}\p{N}_.-]*\.json$/u

/**
 * Derives the download filename from a bibliography title: whitespace becomes
 * `_`, anything but letters, digits, `_`, `.` and `-` is dropped and dot runs
 * are collapsed, so path separators and `..` cannot survive. Letters from any
 * script are kept.
 *
 * Returns null when nothing usable is left.
 */
export function titleToFilename(title: string): string | null {
  const base = Array.from(
    title
      .normalize('NFC')
      .trim()
      .replace(/\s/gu, '_')
      .replace(/[^\p{L}\p{M}\p{N}_.-]/gu, '')
  )
    // Cut by code point before the dot cleanup so a cut can't leave `name.`
    .slice(0, MAX_BASENAME_LENGTH)
    .join('')
    .replace(/\.{2,}/g, '.')
    .replace(/^[.]+/, '')
    .replace(/\.+$/, '')

  return base ? `${base}.json` : null
}

export function isSafeFilename(filename: string): boolean {
  return (
    Array.from(filename).length <= MAX_BASENAME_LENGTH + '.json'.length &&
    !filename.includes('..') &&
    SAFE_FILENAME.test(filename)
  )
}

/**
 * Validates a `filename` query parameter from a download request.
 */
export function parseDownloadFilename(raw: string | null | undefined): string {
  if (!raw) {
    throw new DeliveryError('filename parameter is required', 'MISSING_FILENAME')
  }
  if (raw.includes('/') || raw.includes('\\') || raw.includes('..')) {
    throw new DeliveryError('filename must not contain path segments')
  }
  if (!isSafeFilename(raw)) {
    throw new DeliveryError('filename must be a plain <name>.json')
  }
  return raw
}

/**
 * `Content-Disposition` value for an attachment. Names outside printable ASCII
 * get an `_` fallback in `filename` and the exact name in `filename*`.
 */
export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_')
  if (fallback === filename) {
    return `attachment; filename="${filename}"`
  }
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`
}
