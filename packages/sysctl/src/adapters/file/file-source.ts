import fs from "node:fs/promises"
import path from "node:path"
import { SourceReadError } from "../../core/errors"
import { decodeUtf8 } from "../../core/text/decode-utf8"
import type { TextSource } from "../../ports/text-source"

/**
 * Options for creating a file text source.
 */
export type FileSourceOptions = {
  /**
   * Path to the config file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "/etc/sysctl.conf", "./conf/99-network.conf"
   */
  file: string

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

export class FileTextSource implements TextSource {
  readonly name: string

  constructor(private readonly opts: FileSourceOptions) {
    this.name = `file:${opts.file}`
  }

  async read(): Promise<string> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    try {
      return decodeUtf8(await fs.readFile(filePath))
    } catch (err) {
      throw new SourceReadError(this.name, err)
    }
  }
}
