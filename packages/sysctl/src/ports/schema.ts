export const fieldTypes = ["string", "bool", "int", "float"] as const

export type FieldType = (typeof fieldTypes)[number]

/** Typed value produced for each field type. */
export type FieldValue = string | boolean | bigint | number

export type SchemaField = Readonly<{
  name: string
  type: FieldType
  required: boolean
  description?: string
}>
