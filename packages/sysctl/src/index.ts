export { FileTextSource, type FileSourceOptions } from "./adapters/file/file-source"
export { StreamTextSource } from "./adapters/stream/stream-source"
export { StringTextSource } from "./adapters/string/string-source"
export {
  describeIssue,
  HierarchyError,
  InvalidKeyError,
  ParseError,
  type ParseErrorReason,
  SchemaLoadError,
  type SchemaLoadIssue,
  SourceReadError,
  ValidationError,
} from "./core/errors"
export {
  buildHierarchy,
  flattenHierarchy,
  KEY_SEPARATOR,
  stringifyHierarchy,
} from "./core/hierarchy/hierarchy"
export { parse } from "./core/parser/parse"
export { type ParsedEntry, parseEntries } from "./core/parser/parse-entries"
export {
  isFieldType,
  loadSchema,
  parseSchema,
  Schema,
  type SchemaDefinition,
} from "./core/schema/schema"
export { ConfigStore } from "./core/store/config-store"
export { checkSchema, validate } from "./core/validation/validate"
export { parseValue } from "./core/validation/value-parsers"
export type { ConfigEntry, ConfigReader, IConfigStore } from "./ports/config-store"
export type { HierarchyNode, HierarchyTree } from "./ports/hierarchy"
export { type FieldType, type FieldValue, fieldTypes, type SchemaField } from "./ports/schema"
export type { MissingField, TypeMismatch, ValidationIssue } from "./ports/validation"
export type { TextSource } from "./ports/text-source"
