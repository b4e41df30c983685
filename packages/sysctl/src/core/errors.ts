import { BaseError } from "@sysconf/errors"
import type { ValidationIssue } from "../ports/validation"

export type ParseErrorReason = "missing_separator" | "empty_key"

const parseReasonText: Record<ParseErrorReason, string> = {
  missing_separator: "missing '=' separator",
  empty_key: "empty key",
}

/**
 * A config line that is neither a comment, blank, nor a valid assignment.
 */
export class ParseError extends BaseError<"parse_error"> {
  constructor(
    readonly line: number,
    readonly reason: ParseErrorReason,
  ) {
    super(`Parse error at line ${line}: ${parseReasonText[reason]}`, {
      code: "parse_error",
      context: { line, reason },
    })
  }
}

export class InvalidKeyError extends BaseError<"invalid_key"> {
  constructor(readonly key: string) {
    super("Config keys must not be empty", { code: "invalid_key", context: { key } })
  }
}

/**
 * Two keys claim the same hierarchy path, one as a value and one as a parent.
 */
export class HierarchyError extends BaseError<"hierarchy_conflict"> {
  private constructor(
    message: string,
    readonly key: string,
    readonly conflictsWith: string,
  ) {
    super(message, { code: "hierarchy_conflict", context: { key, conflictsWith } })
  }

  /** `key` descends through `prefix`, which already holds a value. */
  static scalarPrefix(key: string, prefix: string): HierarchyError {
    return new HierarchyError(
      `Key "${key}" conflicts with "${prefix}": "${prefix}" already holds a value`,
      key,
      prefix,
    )
  }

  /** `key` names a path that already holds nested keys, first created by `nestedKey`. */
  static nestedLeaf(key: string, nestedKey: string): HierarchyError {
    return new HierarchyError(
      `Key "${key}" conflicts with "${nestedKey}": "${key}" already holds nested keys`,
      key,
      nestedKey,
    )
  }
}

export type SchemaLoadIssue =
  | { readonly kind: "malformed"; readonly detail: string }
  | { readonly kind: "unknown_type"; readonly field: string; readonly token: string }

export class SchemaLoadError extends BaseError<"schema_load_failed"> {
  private constructor(
    message: string,
    readonly issue: SchemaLoadIssue,
    cause?: unknown,
  ) {
    super(message, { code: "schema_load_failed", context: { ...issue }, cause })
  }

  static malformed(detail: string, cause?: unknown): SchemaLoadError {
    return new SchemaLoadError(
      `Malformed schema definition: ${detail}`,
      { kind: "malformed", detail },
      cause,
    )
  }

  static unknownType(field: string, token: string): SchemaLoadError {
    return new SchemaLoadError(`Unknown type "${token}" for field "${field}"`, {
      kind: "unknown_type",
      field,
      token,
    })
  }
}

export function describeIssue(issue: ValidationIssue): string {
  switch (issue.kind) {
    case "missing":
      return `${issue.field}: required key is missing`
    case "type_mismatch":
      return `${issue.field}: expected ${issue.expected}, got "${issue.value}"`
  }
}

/**
 * Every schema violation found in one validation pass.
 */
export class ValidationError extends BaseError<"validation_failed"> {
  readonly issues: readonly ValidationIssue[]

  constructor(issues: readonly ValidationIssue[]) {
    const frozen = Object.freeze([...issues])

    super(
      `Schema validation failed with ${frozen.length} issue(s): ${frozen.map(describeIssue).join("; ")}`,
      { code: "validation_failed", context: { issues: frozen } },
    )

    this.issues = frozen
  }
}

export class SourceReadError extends BaseError<"source_read_failed"> {
  constructor(
    readonly source: string,
    cause: unknown,
  ) {
    super(`Cannot read ${source}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      code: "source_read_failed",
      context: { source },
      cause,
    })
  }
}
