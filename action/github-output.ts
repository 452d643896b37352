import fsp from 'fs/promises'
import { logger } from './logger.js'

/**
 * Appends `name=value` to the file named by `GITHUB_OUTPUT`. Returns false
 * when the variable is unset or the append fails. Values are written as-is,
 * so callers publishing multi-line data should serialize it to one line first.
 */
export async function writeGitHubOutput(
  name: string,
  value: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<boolean> {
  const outputPath = env.GITHUB_OUTPUT
  if (!outputPath) {
    logger.debug({ name }, 'GITHUB_OUTPUT not set, skipping output')
    return false
  }

  try {
    await fsp.appendFile(outputPath, `${name}=${value}\n`, 'utf-8')
    return true
  } catch (err) {
    logger.warn({ err, name, outputPath }, 'Failed to write GitHub output')
    return false
  }
}
