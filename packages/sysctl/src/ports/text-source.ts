/**
 * A source of configuration text.
 *
 * A TextSource is responsible only for *reading* the whole input.
 * It does not parse or validate.
 */
export interface TextSource {
  /**
   * Human-readable name for diagnostics.
   * Example: "file:/etc/sysctl.conf", "stdin"
   */
  readonly name: string

  /**
   * Read the complete text.
   *
   * Rejects with a SourceReadError when the underlying input cannot be read.
   */
  read(): Promise<string>
}
