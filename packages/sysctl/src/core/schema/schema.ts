import { type Document, isMap, isScalar, parseDocument } from "yaml"
import { z } from "zod"
import { type FieldType, fieldTypes, type SchemaField } from "../../ports/schema"
import { SchemaLoadError } from "../errors"

const fieldDefinition = z.object({
  type: z.string(),
  required: z.boolean().default(false),
  description: z.string().optional(),
})

const schemaDefinition = z.object({
  schema: z.record(z.string().min(1), fieldDefinition),
})

/**
 * The raw shape a schema document must have before type tokens are resolved.
 *
 * @example
 * ```yaml
 * schema:
 *   net.ipv4.ip_forward:
 *     type: bool
 *     required: true
 *     description: Route packets between interfaces
 * ```
 */
export type SchemaDefinition = z.input<typeof schemaDefinition>

/**
 * Immutable, ordered set of field checks keyed by field name.
 */
export class Schema implements Iterable<SchemaField> {
  private readonly byName: ReadonlyMap<string, SchemaField>

  constructor(fields: Iterable<SchemaField>) {
    const byName = new Map<string, SchemaField>()

    for (const field of fields) {
      if (byName.has(field.name)) {
        throw SchemaLoadError.malformed(`field "${field.name}" is declared more than once`)
      }
      byName.set(field.name, Object.freeze({ ...field }))
    }

    this.byName = byName
  }

  get size(): number {
    return this.byName.size
  }

  has(name: string): boolean {
    return this.byName.has(name)
  }

  get(name: string): SchemaField | undefined {
    return this.byName.get(name)
  }

  /** Fields in declaration order. */
  fields(): SchemaField[] {
    return [...this.byName.values()]
  }

  [Symbol.iterator](): Iterator<SchemaField> {
    return this.byName.values()
  }
}

export function isFieldType(token: string): token is FieldType {
  return fieldTypes.some((type) => type === token)
}

/**
 * Builds a Schema from an already-decoded definition document.
 *
 * Fails fast: the first structural problem or unknown type token is reported.
 * Fields follow the definition's own key order, in which a plain object lists
 * integer-like names first; `parseSchema` keeps the order of the document text.
 */
export function loadSchema(definition: unknown): Schema {
  return buildSchema(definition, [])
}

/**
 * Reads a YAML (or JSON) schema document, then loads it like {@link loadSchema}
 * with fields in the order the document declares them.
 */
export function parseSchema(text: string): Schema {
  const doc = parseDocument(text)
  const [error] = doc.errors

  if (error !== undefined) {
    throw SchemaLoadError.malformed(error.message, error)
  }

  const definition: unknown = doc.toJS()

  return buildSchema(definition, declaredFieldNames(doc))
}

function declaredFieldNames(doc: Document): string[] {
  const fields = doc.get("schema")

  if (!isMap(fields)) return []

  return fields.items.map((pair) => String(isScalar(pair.key) ? pair.key.value : pair.key))
}

function buildSchema(definition: unknown, declared: readonly string[]): Schema {
  const result = schemaDefinition.safeParse(definition)

  if (!result.success) {
    throw SchemaLoadError.malformed(z.prettifyError(result.error), result.error)
  }

  const definitions = result.data.schema
  const names = Object.keys(definitions)
  const ordered = [
    ...declared.filter((name) => Object.hasOwn(definitions, name)),
    ...names.filter((name) => !declared.includes(name)),
  ]
  const fields: SchemaField[] = []

  for (const name of ordered) {
    const field = definitions[name]
    if (field === undefined) continue

    const type = field.type.toLowerCase()

    if (!isFieldType(type)) {
      throw SchemaLoadError.unknownType(name, field.type)
    }

    fields.push({
      name,
      type,
      required: field.required,
      ...(field.description !== undefined && { description: field.description }),
    })
  }

  return new Schema(fields)
}
