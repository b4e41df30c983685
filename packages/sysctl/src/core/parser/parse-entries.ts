import { ParseError } from "../errors"

const BYTE_ORDER_MARK = "\uFEFF"

export type ParsedEntry = Readonly<{
  key: string
  value: string
  /** 1-based source line */
  line: number
}>

/**
 * Tokenizes config text into assignments, in source order.
 *
 * - Lines starting with `#` or `;` (after leading whitespace) are comments
 * - Blank lines are skipped
 * - Everything else must be `key = value`; the key ends at the first unescaped `=`
 *
 * Throws a ParseError for the first malformed line. Nothing is returned in that case,
 * so callers never see a partial result.
 */
export function parseEntries(text: string): ParsedEntry[] {
  const source = text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text
  const entries: ParsedEntry[] = []

  for (const [index, raw] of source.split("\n").entries()) {
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw

    if (isSkippable(line)) continue

    entries.push(parseAssignment(line, index + 1))
  }

  return entries
}

function isSkippable(line: string): boolean {
  const content = line.trimStart()

  return content === "" || content.startsWith("#") || content.startsWith(";")
}

function parseAssignment(line: string, lineNumber: number): ParsedEntry {
  const separator = findSeparator(line)

  if (separator === -1) {
    throw new ParseError(lineNumber, "missing_separator")
  }

  const key = unescapeKey(line.slice(0, separator).trim())

  if (key === "") {
    throw new ParseError(lineNumber, "empty_key")
  }

  return { key, value: line.slice(separator + 1).trim(), line: lineNumber }
}

/** Index of the first `=` not preceded by an escaping backslash, or -1. */
function findSeparator(line: string): number {
  for (let i = 0; i < line.length; i++) {
    const ch = line[i]

    if (ch === "\\") {
      i++
    } else if (ch === "=") {
      return i
    }
  }

  return -1
}

function unescapeKey(raw: string): string {
  return raw.replace(/\\(.)/g, "$1")
}
