/**
 * A source of CLI settings.
 *
 * A SettingsSource is responsible only for *loading* raw string values.
 * It does not perform validation or coercion.
 *
 * Sources are applied in order; later sources override earlier ones.
 */
export interface SettingsSource {
  /**
   * Human-readable name for provenance.
   * Example: "env", "dotenv:.env", "flags"
   */
  readonly name: string

  /**
   * Load raw values. An undefined value means "not provided".
   */
  load(): Promise<Record<string, string | undefined>>
}
