import type { ISettings } from "../../ports/settings"

export class Settings<T extends Record<string, unknown>> implements ISettings<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly providedKeys: ReadonlySet<string>,
    private readonly loadOrder: readonly string[],
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<T> {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    const used = new Set(Object.values(this.provenance))

    return [...new Set(this.loadOrder)].filter((name) => used.has(name))
  }

  unknownKeys(): string[] {
    return [...this.providedKeys].filter((key) => !Object.hasOwn(this.data, key))
  }
}
