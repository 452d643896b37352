import { AsyncLocalStorage } from 'async_hooks'
import fs from 'fs'
import path from 'path'
import { createRequire } from 'module'
import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'

const env = process.env.NODE_ENV || 'development'
const DEFAULT_DEBUG_LOG_SIZE: SizeString = '10M'
const DEFAULT_DEBUG_LOG_MAX_FILES = 5

type LogContext = {
  command?: string
  inputKey?: string
  outputName?: string
}

const logContext = new AsyncLocalStorage<LogContext>()
const require = createRequire(import.meta.url)

type SizeString = `${number}B` | `${number}K` | `${number}M` | `${number}G`

type DebugFileStreamOptions = {
  size?: SizeString
  maxFiles?: number
}

export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return logContext.run(context, fn)
}

export function getLogContext(): LogContext | undefined {
  return logContext.getStore()
}

/** Debug file logging is opt-in; CI runners have no home directory worth writing to. */
export function resolveDebugLogPath(envVars: NodeJS.ProcessEnv = process.env): string | null {
  const explicitPath = envVars.LOG_DEBUG_PATH?.trim()
  return explicitPath ? path.resolve(explicitPath) : null
}

/** LOG_LEVEL wins; otherwise debug when a debug file is configured, info when not. */
export function resolveLogLevel(envVars: NodeJS.ProcessEnv = process.env): string {
  const explicit = envVars.LOG_LEVEL?.trim()
  if (explicit) return explicit
  return resolveDebugLogPath(envVars) ? 'debug' : 'info'
}

export function createDebugFileStream(filePath: string, options: DebugFileStreamOptions = {}): RotatingFileStream {
  const size = options.size ?? DEFAULT_DEBUG_LOG_SIZE
  const maxFiles = options.maxFiles ?? DEFAULT_DEBUG_LOG_MAX_FILES
  const dir = path.dirname(filePath)
  fs.mkdirSync(dir, { recursive: true })
  return createStream(path.basename(filePath), { path: dir, size, maxFiles })
}

function createPinoOptions() {
  return {
    level: resolveLogLevel(),
    base: {
      app: 'repo-path-guard',
      env,
    },
    formatters: {
      level(label: string, number: number) {
        return { level: number, severity: label }
      },
    },
    mixin() {
      // pino mutates the mixin result while merging; hand out a fresh object.
      const ctx = logContext.getStore()
      return ctx ? { ...ctx } : {}
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  }
}

// stdout carries command results, so console logs go to stderr.
function createConsoleStream(shouldPrettyPrint: boolean): DestinationStream {
  if (!shouldPrettyPrint) return pino.destination(2)
  const { PinoPretty } = require('pino-pretty') as typeof import('pino-pretty')
  return PinoPretty({ colorize: true, translateTime: 'SYS:standard', destination: 2 })
}

function attachDebugStreamWarnings(
  stream: RotatingFileStream,
  consoleLogger: Logger,
  filePath: string,
) {
  let warned = false
  const warnOnce = (err: Error, event: string) => {
    if (warned) return
    warned = true
    consoleLogger.warn({ err, filePath, event }, 'Debug log stream issue')
  }
  stream.on('error', (err: Error) => warnOnce(err, 'error'))
  stream.on('warning', (err: Error) => warnOnce(err, 'warning'))
}

export function createLogger(destination?: DestinationStream) {
  if (destination) {
    return pino(createPinoOptions(), destination)
  }

  const shouldPrettyPrint = env !== 'production' && env !== 'test'
  const consoleStream = createConsoleStream(shouldPrettyPrint)
  const consoleLogger = pino(createPinoOptions(), consoleStream)
  const streams: Array<{ stream: DestinationStream; level: LevelWithSilent }> = [
    { stream: consoleStream, level: 'info' },
  ]

  const debugLogPath = resolveDebugLogPath()
  if (debugLogPath) {
    try {
      const debugStream = createDebugFileStream(debugLogPath)
      streams.push({ stream: debugStream, level: 'debug' })
      attachDebugStreamWarnings(debugStream, consoleLogger, debugLogPath)
    } catch (err) {
      consoleLogger.warn({ err, filePath: debugLogPath }, 'Debug log file disabled')
    }
  }

  return pino(createPinoOptions(), pino.multistream(streams))
}

export const logger = createLogger()

export function setLogLevel(nextLevel: LevelWithSilent): void {
  logger.level = nextLevel
}
