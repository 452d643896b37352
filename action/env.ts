import { splitTrimmedLines } from '../shared/string-list.js'

const BOOLEAN_VALUES = new Map<string, boolean>([
  ['1', true],
  ['t', true],
  ['T', true],
  ['TRUE', true],
  ['true', true],
  ['True', true],
  ['0', false],
  ['f', false],
  ['F', false],
  ['FALSE', false],
  ['false', false],
  ['False', false],
])

const INTEGER_RE = /^[+-]?\d+$/

export function parseStringArrayEnv(key: string, env: NodeJS.ProcessEnv = process.env): string[] {
  return splitTrimmedLines(env[key] ?? '')
}

/** Unset or empty reads as false; anything outside the known spellings throws. */
export function parseBoolEnv(key: string, env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[key]
  if (!value) return false
  const parsed = BOOLEAN_VALUES.get(value)
  if (parsed === undefined) {
    throw new Error(`${key} must be a boolean, got ${JSON.stringify(value)}`)
  }
  return parsed
}

export function parseUintEnv(
  key: string,
  defaultValue: number,
  env: NodeJS.ProcessEnv = process.env,
): number {
  const value = env[key]
  if (!value || !INTEGER_RE.test(value)) return defaultValue
  const parsed = Number.parseInt(value, 10)
  return Number.isSafeInteger(parsed) && parsed >= 1 ? parsed : defaultValue
}
