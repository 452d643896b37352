export {
  checkRepoPath,
  describePathError,
  normalizeRepoPath,
  PATH_ERROR_MESSAGES,
  validateRepoPath,
  type PathErrorKind,
  type PathVerdict,
} from '../shared/repo-path.js'
export { splitNumberedLines, splitTrimmedLines, type NumberedLine } from '../shared/string-list.js'
export { envLookup, parseRepoPathList, PathListError, readRepoPathList, type EnvLookup } from './path-list.js'
export { parseBoolEnv, parseStringArrayEnv, parseUintEnv } from './env.js'
export { TailRing, tee } from './tail-ring.js'
export { writeGitHubOutput } from './github-output.js'
export { ActionConfigSchema, resolveConfig, type ActionConfig } from './config.js'
export { logger, createLogger, setLogLevel, withLogContext } from './logger.js'
