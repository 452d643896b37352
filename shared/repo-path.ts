export type PathErrorKind =
  | 'required-missing'
  | 'not-relative'
  | 'drive-prefixed'
  | 'escapes-root'
  | 'glob-character'

export type PathVerdict =
  | { ok: true; path: string }
  | { ok: false; kind: Exclude<PathErrorKind, 'required-missing'> }

export const PATH_ERROR_MESSAGES: Record<PathErrorKind, string> = {
  'required-missing': 'value is required',
  'not-relative': 'path must be relative to repo',
  'drive-prefixed': 'drive-prefixed paths are not allowed',
  'escapes-root': 'path escapes repo root',
  'glob-character': 'glob characters are not allowed',
}

const LEADING_SEPARATOR_RE = /^[\\/]/
const DRIVE_PREFIX_RE = /^[A-Za-z]:/
const GLOB_CHARACTER_RE = /[*?[\]]/

/**
 * Lexically cleans a path into forward-slash form: collapses separators,
 * resolves `.` and `..`, strips the trailing separator. A leading `..` that
 * cannot be resolved is kept so the validator can see the escape; a leading
 * `/` is kept for the same reason.
 */
export function normalizeRepoPath(input: string): string {
  if (!input) return ''
  const slashed = input.replace(/\\/g, '/')
  const rooted = slashed.startsWith('/')
  const segments: string[] = []

  for (const segment of slashed.split('/')) {
    if (!segment || segment === '.') continue
    if (segment === '..') {
      if (segments.length > 0 && segments[segments.length - 1] !== '..') {
        segments.pop()
        continue
      }
      // Nothing above `/` to climb to.
      if (rooted) continue
    }
    segments.push(segment)
  }

  const joined = segments.join('/')
  if (rooted) return `/${joined}`
  return joined || '.'
}

export function validateRepoPath(normalized: string): PathVerdict {
  if (!normalized || LEADING_SEPARATOR_RE.test(normalized)) {
    return { ok: false, kind: 'not-relative' }
  }
  if (DRIVE_PREFIX_RE.test(normalized)) {
    return { ok: false, kind: 'drive-prefixed' }
  }
  if (normalized === '..' || normalized.startsWith('../')) {
    return { ok: false, kind: 'escapes-root' }
  }
  if (GLOB_CHARACTER_RE.test(normalized)) {
    return { ok: false, kind: 'glob-character' }
  }
  return { ok: true, path: normalized }
}

export function checkRepoPath(input: string): PathVerdict {
  return validateRepoPath(normalizeRepoPath(input))
}

export function describePathError(kind: PathErrorKind, entry?: string): string {
  const message = PATH_ERROR_MESSAGES[kind]
  return entry === undefined ? message : `${message}: ${JSON.stringify(entry)}`
}
