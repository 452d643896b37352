import { checkRepoPath, describePathError } from '../../shared/repo-path.js'
import { resolveConfig } from '../config.js'
import { writeGitHubOutput } from '../github-output.js'
import { logger, setLogLevel, withLogContext } from '../logger.js'
import { envLookup, PathListError, readRepoPathList } from '../path-list.js'
import { parseArgs } from './args.js'
import { writeError, writeJson, writeLines, writeText } from './output.js'

type Flags = Record<string, string | boolean>

export const USAGE = `Usage:
  repo-paths [parse] [--key KEY] [--output NAME] [--format lines|json] [--quiet]
  repo-paths check <path>

parse  Read a newline-separated path list from env var KEY (default INPUT_PATHS),
       print the accepted repo-relative paths, and publish them as a JSON array
       to GITHUB_OUTPUT under NAME when --output is given.
check  Normalize and validate a single path.`

const aliases: Partial<Record<string, string>> = {
  validate: 'check',
  list: 'parse',
}

async function runParse(flags: Flags, env: NodeJS.ProcessEnv): Promise<number> {
  const config = resolveConfig(flags, env)
  return withLogContext(
    { command: 'parse', inputKey: config.inputKey, outputName: config.outputName },
    async () => {
      const paths = readRepoPathList(config.inputKey, envLookup(env))
      logger.info({ count: paths.length }, 'Accepted repo paths')

      if (config.format === 'json') {
        writeJson(paths)
      } else {
        writeLines(paths)
      }

      if (config.outputName) {
        const written = await writeGitHubOutput(config.outputName, JSON.stringify(paths), env)
        if (!written) logger.warn('Paths were not published to GITHUB_OUTPUT')
      }
      return 0
    },
  )
}

function runCheck(args: string[]): number {
  const input = args[0]?.trim()
  if (!input) {
    writeError('path required')
    return 1
  }
  const verdict = checkRepoPath(input)
  if (!verdict.ok) {
    logger.debug({ input, kind: verdict.kind }, 'Path rejected')
    writeError(describePathError(verdict.kind, input))
    return 1
  }
  writeText(verdict.path)
  return 0
}

export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const { command: rawCommand, flags, args } = parseArgs(argv)
  const command = rawCommand ? aliases[rawCommand] ?? rawCommand : 'parse'

  if (flags.h || flags.help || command === 'help') {
    writeText(USAGE)
    return 0
  }
  if (flags.q || flags.quiet) setLogLevel('warn')

  try {
    switch (command) {
      case 'parse':
        return await runParse(flags, env)
      case 'check':
        return runCheck(args)
      default:
        writeError(`unknown command: ${command}`)
        return 1
    }
  } catch (err) {
    if (err instanceof PathListError) {
      logger.warn({ kind: err.kind, key: err.key, line: err.line, entry: err.entry }, 'Path list rejected')
    } else {
      logger.error({ err }, 'repo-paths failed')
    }
    writeError(err)
    return 1
  }
}
