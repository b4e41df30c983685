import { logLevelNames } from "@sysconf/logger"
import { z } from "zod"

export const SETTINGS_PREFIX = "SYSCONF_"

export const settingsSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("warn"),
  LOG_PRETTY: z.stringbool().default(false),
  JSON_INDENT: z.coerce.number().int().min(0).max(8).default(2),
})

export type CliSettings = z.output<typeof settingsSchema>
