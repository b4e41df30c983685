export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { FlagSource } from "./adapters/flags/flag-source"
export { type CliFlags, createProgram } from "./core/program"
export { formatError, renderReport, type ReportOptions } from "./core/report"
export { ExitCode, run, type RunOptions } from "./core/run"
export { loadSettings, type LoadSettingsOptions, SettingsError } from "./core/settings/load-settings"
export { type CliSettings, settingsSchema } from "./core/settings/settings-schema"
export type { CliIo } from "./ports/cli-io"
export type { ISettings } from "./ports/settings"
export type { SettingsSource } from "./ports/settings-source"
