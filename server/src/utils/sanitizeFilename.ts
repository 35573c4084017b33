import path from 'path'

/**
 * Safe character set for stored filenames: letters, numbers, dot, dash, underscore.
 * Whitespace becomes underscores.
 */
const UNSAFE_FILENAME_CHARS = /[^a-zA-Z0-9._-]/g

const FALLBACK_NAME = 'video'

/**
 * Sanitize a user-provided filename for safe storage under the uploads directory.
 * - Takes basename (strips path components, both / and \ separators)
 * - Strips NULL bytes
 * - Whitespace runs → single underscore; other unsafe characters dropped
 * - Leading dots of the stem removed (no hidden files, no "..")
 * - Returns `video<ext>` (or `video`) if nothing usable is left of the stem
 */
export function sanitizeFilename(originalName: string | undefined): string {
  if (originalName == null) return FALLBACK_NAME
  const base = path.basename(originalName.replace(/\0/g, '').replace(/\\/g, '/'))
  const cleaned = base.trim().replace(/\s+/g, '_').replace(UNSAFE_FILENAME_CHARS, '')

  const dot = cleaned.lastIndexOf('.')
  const rawExt = dot > -1 ? cleaned.slice(dot) : ''
  const ext = rawExt === '.' ? '' : rawExt
  const stem = (dot > -1 ? cleaned.slice(0, dot) : cleaned).replace(/^\.+/, '')
  if (!stem.replace(/[._-]/g, '')) {
    return `${FALLBACK_NAME}${ext}`
  }
  return `${stem}${ext}`
}
