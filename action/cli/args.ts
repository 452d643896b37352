export type ParsedArgs = {
  command?: string
  flags: Record<string, string | boolean>
  args: string[]
}

const BOOLEAN_FLAGS = new Set([
  'h',
  'help',
  'q', // quiet: no logging below warn
  'quiet',
])

function canUseAsFlagValue(token: string | undefined): token is string {
  if (!token) return false
  if (token === '--') return false
  return !token.startsWith('-')
}

export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {}
  const args: string[] = []
  let command: string | undefined
  let i = 0

  while (i < argv.length) {
    const token = argv[i]
    if (!command && !token.startsWith('-')) {
      command = token
      i += 1
      continue
    }

    if (token === '--') {
      args.push(...argv.slice(i + 1))
      break
    }

    if (token.startsWith('-') && token.length > 1) {
      const raw = token.startsWith('--') ? token.slice(2) : token.slice(1)
      const eqIndex = raw.indexOf('=')
      if (eqIndex >= 0) {
        flags[raw.slice(0, eqIndex)] = raw.slice(eqIndex + 1)
        i += 1
        continue
      }
      const next = argv[i + 1]
      if (!BOOLEAN_FLAGS.has(raw) && canUseAsFlagValue(next)) {
        flags[raw] = next
        i += 2
        continue
      }
      flags[raw] = true
      i += 1
      continue
    }

    args.push(token)
    i += 1
  }

  return { command, flags, args }
}
