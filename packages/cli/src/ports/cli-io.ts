import type { Writable } from "node:stream"

/**
 * The process surface a CLI run talks to. Tests substitute in-memory streams.
 */
export type CliIo = {
  stdin: NodeJS.ReadableStream
  stdout: Writable
  stderr: Writable
  env: Record<string, string | undefined>
  /** Base directory for relative file arguments and the `.env` file. */
  cwd: string
}
