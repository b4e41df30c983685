import type { SettingsSource } from "../../ports/settings-source"

export type EnvSourceOptions = {
  /** Only variables starting with this prefix are read; the prefix is stripped. */
  prefix: string
  env?: Record<string, string | undefined>
}

export function selectPrefixed(
  values: Record<string, string | undefined>,
  prefix: string,
): Record<string, string | undefined> {
  const selected: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix) && key.length > prefix.length) {
      selected[key.slice(prefix.length)] = value
    }
  }

  return selected
}

export class EnvSource implements SettingsSource {
  readonly name = "env"
  private readonly env: Record<string, string | undefined>

  constructor(private readonly options: EnvSourceOptions) {
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, string | undefined>> {
    return selectPrefixed(this.env, this.options.prefix)
  }
}
