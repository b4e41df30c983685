import type { FieldType, FieldValue } from "../../ports/schema"

const TRUE_WORDS = new Set(["true", "1", "on", "yes"])
const FALSE_WORDS = new Set(["false", "0", "off", "no"])

const INTEGER = /^-?\d+$/
const FLOAT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/

// signed 64-bit range
const INT_MIN = -(2n ** 63n)
const INT_MAX = 2n ** 63n - 1n

const valueParsers = {
  string: (raw) => raw,
  bool: (raw) => {
    const word = raw.toLowerCase()

    if (TRUE_WORDS.has(word)) return true
    if (FALSE_WORDS.has(word)) return false

    return undefined
  },
  int: (raw) => {
    if (!INTEGER.test(raw)) return undefined

    const value = BigInt(raw)

    return value < INT_MIN || value > INT_MAX ? undefined : value
  },
  float: (raw) => (FLOAT.test(raw) ? Number(raw) : undefined),
} satisfies Record<FieldType, (raw: string) => FieldValue | undefined>

/**
 * Interprets a raw config value as `type`.
 *
 * @returns the typed value, or `undefined` when `raw` is not a valid literal of that type
 */
export function parseValue(type: FieldType, raw: string): FieldValue | undefined {
  return valueParsers[type](raw)
}
