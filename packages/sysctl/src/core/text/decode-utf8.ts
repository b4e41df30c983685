const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

/**
 * Strict UTF-8 decoding: malformed bytes throw a TypeError instead of turning
 * into U+FFFD. A leading BOM is kept for the parser to drop.
 */
export function decodeUtf8(bytes: Uint8Array): string {
  return decoder.decode(bytes)
}
