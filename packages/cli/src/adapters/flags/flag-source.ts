import type { SettingsSource } from "../../ports/settings-source"

/**
 * Settings given on the command line. Applied last, so flags win.
 */
export class FlagSource implements SettingsSource {
  readonly name = "flags"

  constructor(private readonly flags: Record<string, string | undefined>) {}

  async load(): Promise<Record<string, string | undefined>> {
    return { ...this.flags }
  }
}
