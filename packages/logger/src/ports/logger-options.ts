import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior:
 * - which log levels are emitted
 * - how logs are rendered for humans vs machines
 *
 * Concrete adapters must honor these options, but are free to choose how
 * they are implemented internally.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Any log entries below this level are ignored.
   */
  level: LogLevelName

  /**
   * Whether to pretty-print log output for human readability.
   *
   * @remarks
   * Off by default so the CLI emits JSON lines that other tools can consume.
   */
  prettify?: boolean
}
