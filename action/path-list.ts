import {
  describePathError,
  normalizeRepoPath,
  validateRepoPath,
  type PathErrorKind,
} from '../shared/repo-path.js'
import { splitNumberedLines } from '../shared/string-list.js'

export type EnvLookup = (key: string) => string | undefined

export class PathListError extends Error {
  readonly kind: PathErrorKind
  readonly key: string
  readonly entry?: string
  readonly line?: number

  constructor(opts: { kind: PathErrorKind; key: string; entry?: string; line?: number }) {
    const detail = opts.kind === 'required-missing'
      ? `${opts.key} is required`
      : `${opts.key} line ${opts.line}: ${describePathError(opts.kind, opts.entry)}`
    super(detail)
    this.name = 'PathListError'
    this.kind = opts.kind
    this.key = opts.key
    this.entry = opts.entry
    this.line = opts.line
  }
}

export function envLookup(env: NodeJS.ProcessEnv = process.env): EnvLookup {
  return (key) => env[key]
}

/**
 * Turns a multi-line input into an ordered, de-duplicated list of repo
 * relative paths. Blank input counts as missing. Stops at the first rejected
 * line; nothing is returned for a list that contains any rejected entry.
 */
export function parseRepoPathList(key: string, raw: string | undefined): string[] {
  const lines = raw ? splitNumberedLines(raw) : []
  if (lines.length === 0) {
    throw new PathListError({ kind: 'required-missing', key })
  }

  const seen = new Set<string>()
  const out: string[] = []
  for (const { lineNumber, text } of lines) {
    const verdict = validateRepoPath(normalizeRepoPath(text))
    if (!verdict.ok) {
      throw new PathListError({ kind: verdict.kind, key, entry: text, line: lineNumber })
    }
    if (seen.has(verdict.path)) continue
    seen.add(verdict.path)
    out.push(verdict.path)
  }
  return out
}

export function readRepoPathList(key: string, lookup: EnvLookup = envLookup()): string[] {
  return parseRepoPathList(key, lookup(key))
}
