import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { SettingsSource } from "../../ports/settings-source"
import { selectPrefixed } from "../env/env-source"

/**
 * Options for creating a dotenv settings source.
 */
export type DotenvSourceOptions = {
  /**
   * Path to the .env file.
   *
   * Can be absolute or relative to `cwd`.
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws if file not found.
   * - `false`: Contributes nothing if file not found.
   */
  required: boolean

  /** Only variables starting with this prefix are read; the prefix is stripped. */
  prefix: string

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export class DotenvSource implements SettingsSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, string | undefined>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return selectPrefixed(parse(content), this.opts.prefix)
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) {
        return {}
      }
      throw err
    }
  }
}
