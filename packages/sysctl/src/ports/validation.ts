import type { FieldType } from "./schema"

export type MissingField = {
  readonly kind: "missing"
  readonly field: string
}

export type TypeMismatch = {
  readonly kind: "type_mismatch"
  readonly field: string
  readonly expected: FieldType
  readonly value: string
}

/**
 * One schema violation. A validation pass reports every issue it finds.
 */
export type ValidationIssue = MissingField | TypeMismatch
