import type { ConfigEntry, IConfigStore } from "../../ports/config-store"
import type { HierarchyTree } from "../../ports/hierarchy"
import { InvalidKeyError } from "../errors"
import { buildHierarchy } from "../hierarchy/hierarchy"
import { parseEntries } from "../parser/parse-entries"
import type { Schema } from "../schema/schema"
import { validate } from "../validation/validate"

export class ConfigStore implements IConfigStore {
  private readonly values = new Map<string, string>()

  static from(entries: Iterable<ConfigEntry>): ConfigStore {
    const store = new ConfigStore()

    for (const [key, value] of entries) {
      store.set(key, value)
    }

    return store
  }

  get size(): number {
    return this.values.size
  }

  isEmpty(): boolean {
    return this.values.size === 0
  }

  has(key: string): boolean {
    return this.values.has(key)
  }

  get(key: string): string | undefined {
    return this.values.get(key)
  }

  set(key: string, value: string): this {
    if (key === "") {
      throw new InvalidKeyError(key)
    }

    this.values.set(key, value)

    return this
  }

  keys(): string[] {
    return [...this.values.keys()]
  }

  entries(): Iterable<ConfigEntry> {
    const values = this.values

    return {
      [Symbol.iterator]: () => values.entries(),
    }
  }

  [Symbol.iterator](): Iterator<ConfigEntry> {
    return this.values.entries()
  }

  /**
   * Parses `text` and merges it into this store.
   *
   * All-or-nothing: when any line fails, the ParseError propagates and the
   * store is left exactly as it was.
   */
  parse(text: string): this {
    for (const { key, value } of parseEntries(text)) {
      this.values.set(key, value)
    }

    return this
  }

  /** Plain object export, in key order. */
  toRecord(): Record<string, string> {
    return Object.fromEntries(this.values)
  }

  toHierarchy(): HierarchyTree {
    return buildHierarchy(this.values.entries())
  }

  /** Throws a ValidationError listing every violation of `schema`. */
  validate(schema: Schema): void {
    validate(this, schema)
  }
}
