import { toAppError } from "@sysconf/errors"
import {
  type ConfigStore,
  describeIssue,
  HierarchyError,
  ParseError,
  SchemaLoadError,
  SourceReadError,
  stringifyHierarchy,
  ValidationError,
} from "@sysconf/sysctl"
import { SettingsError } from "./settings/load-settings"

export type ReportOptions = {
  /** Append the nested JSON rendering. */
  json: boolean
  indent: number
}

/**
 * Human-readable summary of a parsed store: a count, every assignment, then the
 * hierarchy as JSON.
 *
 * The whole report is built before anything is written, so a HierarchyError
 * leaves no partial output behind.
 */
export function renderReport(store: ConfigStore, options: ReportOptions): string {
  const sections = [`Loaded ${store.size} setting(s)`]

  if (!store.isEmpty()) {
    sections.push(store.keys().map((key) => `${key} = ${store.get(key) ?? ""}`).join("\n"))
  }

  if (options.json) {
    sections.push(`JSON:\n${stringifyHierarchy(store.toHierarchy(), options.indent)}`)
  }

  return `${sections.join("\n\n")}\n`
}

export function formatError(err: unknown): string {
  if (err instanceof ParseError || err instanceof SourceReadError || err instanceof SettingsError) {
    return err.message
  }

  if (err instanceof SchemaLoadError) {
    return `Schema error: ${err.message}`
  }

  if (err instanceof ValidationError) {
    return ["Schema validation failed:", ...err.issues.map((i) => `  - ${describeIssue(i)}`)].join(
      "\n",
    )
  }

  if (err instanceof HierarchyError) {
    return `Hierarchy error: ${err.message}`
  }

  return `Error: ${toAppError(err).message}`
}
