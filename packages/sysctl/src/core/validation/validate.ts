import type { ConfigReader } from "../../ports/config-store"
import type { ValidationIssue } from "../../ports/validation"
import { ValidationError } from "../errors"
import type { Schema } from "../schema/schema"
import { parseValue } from "./value-parsers"

/**
 * Checks `store` against every field of `schema` without stopping at the first problem.
 *
 * Missing required fields come first, then type mismatches, each in schema order.
 * Store keys the schema does not declare are ignored.
 */
export function checkSchema(store: ConfigReader, schema: Schema): ValidationIssue[] {
  const missing: ValidationIssue[] = []
  const mismatched: ValidationIssue[] = []

  for (const field of schema) {
    const value = store.get(field.name)

    if (value === undefined) {
      if (field.required) missing.push({ kind: "missing", field: field.name })
      continue
    }

    if (parseValue(field.type, value) === undefined) {
      mismatched.push({ kind: "type_mismatch", field: field.name, expected: field.type, value })
    }
  }

  return [...missing, ...mismatched]
}

/**
 * @throws ValidationError carrying every issue found by {@link checkSchema}
 */
export function validate(store: ConfigReader, schema: Schema): void {
  const issues = checkSchema(store, schema)

  if (issues.length > 0) {
    throw new ValidationError(issues)
  }
}
