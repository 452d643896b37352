export function writeText(text: string) {
  process.stdout.write(text.endsWith('\n') ? text : `${text}\n`)
}

export function writeLines(lines: readonly string[]) {
  if (lines.length === 0) return
  writeText(lines.join('\n'))
}

export function writeJson(data: unknown) {
  writeText(JSON.stringify(data))
}

export function writeError(err: unknown) {
  const message = err instanceof Error ? err.message : String(err)
  process.stderr.write(`repo-paths: ${message}\n`)
}
