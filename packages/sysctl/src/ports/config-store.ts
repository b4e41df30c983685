import type { HierarchyTree } from "./hierarchy"

/**
 * One `key = value` assignment. Values stay raw strings until a schema types them.
 */
export type ConfigEntry = readonly [key: string, value: string]

/**
 * Read access to parsed configuration, which is all the validator needs.
 */
export interface ConfigReader {
  get(key: string): string | undefined
  has(key: string): boolean
}

/**
 * Ordered, mutable key/value store produced by the parser.
 *
 * @example
 * ```typescript
 * const store = parse("net.ipv4.ip_forward = 1\ndebug = true")
 *
 * store.get("debug")    // "true"
 * store.keys()          // ["net.ipv4.ip_forward", "debug"]
 * stringifyHierarchy(store.toHierarchy())   // {"net":{"ipv4":{"ip_forward":"1"}},"debug":"true"}
 * ```
 */
export interface IConfigStore extends ConfigReader, Iterable<ConfigEntry> {
  readonly size: number

  /**
   * Writes a value. An existing key keeps its position and takes the new value.
   */
  set(key: string, value: string): this

  /** Keys in first-insertion order. */
  keys(): string[]

  /**
   * Entries in key order.
   *
   * The returned iterable is lazy and can be iterated any number of times.
   */
  entries(): Iterable<ConfigEntry>

  /** Nested view of the store, one mapping level per dot-separated segment. */
  toHierarchy(): HierarchyTree
}
