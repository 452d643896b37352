import { describe, it, expect, vi } from 'vitest'
import { envLookup, parseRepoPathList, PathListError, readRepoPathList } from '../../../action/path-list.js'

function expectPathListError(fn: () => unknown): PathListError {
  try {
    fn()
  } catch (err) {
    expect(err).toBeInstanceOf(PathListError)
    if (err instanceof PathListError) return err
  }
  throw new Error('expected PathListError')
}

describe('parseRepoPathList', () => {
  it('returns a single valid entry unchanged', () => {
    expect(parseRepoPathList('PATHS', 'locales')).toEqual(['locales'])
  })

  it('normalizes, de-duplicates and keeps first-seen order', () => {
    const raw = ['./x', 'x/', './y', 'a//b/../c', 'x'].join('\n')
    expect(parseRepoPathList('PATHS', raw)).toEqual(['x', 'y', 'a/c'])
  })

  it('ignores blank lines and surrounding whitespace', () => {
    expect(parseRepoPathList('PATHS', '\n  docs \r\n\n\tsrc/app\n')).toEqual(['docs', 'src/app'])
  })

  it('fails with required-missing for absent, empty or blank input', () => {
    for (const raw of [undefined, '', ' \n\t\n']) {
      const err = expectPathListError(() => parseRepoPathList('INPUT_PATHS', raw))
      expect(err.kind).toBe('required-missing')
      expect(err.key).toBe('INPUT_PATHS')
      expect(err.message).toBe('INPUT_PATHS is required')
    }
  })

  it('stops at the first glob entry', () => {
    const err = expectPathListError(() => parseRepoPathList('PATHS', 'locales/*\nvalid'))
    expect(err.kind).toBe('glob-character')
    expect(err.entry).toBe('locales/*')
    expect(err.line).toBe(1)
    expect(err.message).toBe('PATHS line 1: glob characters are not allowed: "locales/*"')
  })

  it('attributes an escape to its own line', () => {
    const err = expectPathListError(() => parseRepoPathList('PATHS', 'a\n../up\nb'))
    expect(err.kind).toBe('escapes-root')
    expect(err.entry).toBe('../up')
    expect(err.line).toBe(2)
    expect(err.message).toContain('escapes repo root')
  })

  it('counts skipped blank lines in the reported line number', () => {
    const err = expectPathListError(() => parseRepoPathList('PATHS', 'a\n\n\n/etc'))
    expect(err.kind).toBe('not-relative')
    expect(err.line).toBe(4)
    expect(err.message).toContain('path must be relative to repo')
  })

  it('splits on a lone carriage return before validating', () => {
    const err = expectPathListError(() => parseRepoPathList('PATHS', 'docs\r../up'))
    expect(err.kind).toBe('escapes-root')
    expect(err.entry).toBe('../up')
    expect(err.line).toBe(2)
  })

  it('rejects an escape that only shows up after normalization', () => {
    const err = expectPathListError(() => parseRepoPathList('PATHS', 'a/../../b'))
    expect(err.kind).toBe('escapes-root')
  })

  it('rejects drive-prefixed entries', () => {
    const err = expectPathListError(() => parseRepoPathList('PATHS', 'ok\nC:foo'))
    expect(err.kind).toBe('drive-prefixed')
    expect(err.message).toContain('drive-prefixed')
  })

  it('rejects a later invalid line even when earlier lines are valid', () => {
    const err = expectPathListError(() => parseRepoPathList('PATHS', 'a\nb\nc/[x]'))
    expect(err.kind).toBe('glob-character')
    expect(err.line).toBe(3)
  })

  it('accepts "." as an entry', () => {
    expect(parseRepoPathList('PATHS', '.\n./')).toEqual(['.'])
  })
})

describe('readRepoPathList', () => {
  it('reads the raw value through the injected lookup', () => {
    const lookup = vi.fn((key: string) => (key === 'LOCALES' ? 'en\nde\nen' : undefined))
    expect(readRepoPathList('LOCALES', lookup)).toEqual(['en', 'de'])
    expect(lookup).toHaveBeenCalledWith('LOCALES')
  })

  it('fails when the lookup has no value', () => {
    const err = expectPathListError(() => readRepoPathList('MISSING', () => undefined))
    expect(err.kind).toBe('required-missing')
  })

  it('reads from an env record via envLookup', () => {
    expect(readRepoPathList('PATHS', envLookup({ PATHS: 'docs/' }))).toEqual(['docs'])
  })
})
