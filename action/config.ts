import { z } from 'zod'

export const DEFAULT_INPUT_KEY = 'INPUT_PATHS'

export const ActionConfigSchema = z
  .object({
    inputKey: z.string().trim().min(1, 'input key must not be empty'),
    outputName: z
      .string()
      .trim()
      .regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, 'output name must be a plain identifier')
      .optional(),
    format: z.enum(['lines', 'json']),
  })
  .strict()

export type ActionConfig = z.infer<typeof ActionConfigSchema>

type Flags = Record<string, string | boolean>

function flagString(flags: Flags, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = flags[name]
    if (typeof value === 'string') return value
  }
  return undefined
}

/** Flags win over env, env wins over defaults. */
export function resolveConfig(flags: Flags = {}, env: NodeJS.ProcessEnv = process.env): ActionConfig {
  const parsed = ActionConfigSchema.safeParse({
    inputKey: flagString(flags, 'key', 'k') || env.REPO_PATHS_KEY || DEFAULT_INPUT_KEY,
    outputName: flagString(flags, 'output', 'o') || env.REPO_PATHS_OUTPUT || undefined,
    format: flagString(flags, 'format', 'f') || env.REPO_PATHS_FORMAT || 'lines',
  })
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue?.path.join('.') || 'config'
    throw new Error(`invalid ${field}: ${issue?.message ?? 'unknown error'}`)
  }
  return parsed.data
}
