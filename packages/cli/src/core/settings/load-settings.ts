import { BaseError } from "@sysconf/errors"
import { type ZodType, z } from "zod"
import type { ISettings } from "../../ports/settings"
import type { SettingsSource } from "../../ports/settings-source"
import { Settings } from "./settings"

export class SettingsError extends BaseError<"settings_invalid"> {
  constructor(detail: string, cause: unknown) {
    super(`Invalid settings:\n${detail}`, { code: "settings_invalid", cause })
  }
}

export type LoadSettingsOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources: SettingsSource[]
}

export async function loadSettings<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadSettingsOptions<T>): Promise<ISettings<T>> {
  const merged: Record<string, string> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new SettingsError(z.prettifyError(result.error), result.error)
  }

  return new Settings<T>(
    result.data,
    provenance,
    new Set(Object.keys(merged)),
    sources.map((source) => source.name),
  )
}
