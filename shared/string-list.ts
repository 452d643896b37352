export type NumberedLine = {
  lineNumber: number
  text: string
}

const LINE_BREAK_RE = /\r\n|\r|\n/

/**
 * Splits multi-line input on `\n`, `\r\n` or a lone `\r`, trims every line and
 * drops the blank ones. Line numbers are 1-based and count the dropped lines too.
 */
export function splitNumberedLines(input: string): NumberedLine[] {
  if (!input) return []
  const out: NumberedLine[] = []
  input.split(LINE_BREAK_RE).forEach((raw, index) => {
    const text = raw.trim()
    if (!text) return
    out.push({ lineNumber: index + 1, text })
  })
  return out
}

export function splitTrimmedLines(input: string): string[] {
  return splitNumberedLines(input).map((line) => line.text)
}
