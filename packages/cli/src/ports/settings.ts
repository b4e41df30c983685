/**
 * Validated settings with provenance.
 *
 * @typeParam T - The settings shape, inferred from a zod schema.
 *
 * @example
 * ```typescript
 * const settings = await loadSettings({
 *   schema: z.object({ LOG_LEVEL: z.enum(logLevelNames).default("warn") }),
 *   sources: [new EnvSource({ prefix: "SYSCONF_" })],
 * })
 *
 * settings.get("LOG_LEVEL")     // "warn"
 * settings.explain("LOG_LEVEL") // "default"
 * ```
 */
export interface ISettings<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Which source provided the final value for a key, or "default" when
   * the schema default applied.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that supplied at least one final value, in load order. */
  sourcesUsed(): string[]

  /** Keys provided by a source that the schema does not define. */
  unknownKeys(): string[]
}
