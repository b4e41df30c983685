import type { ConfigEntry } from "../../ports/config-store"
import type { HierarchyNode, HierarchyTree } from "../../ports/hierarchy"
import { HierarchyError } from "../errors"

export const KEY_SEPARATOR = "."

/**
 * Nests dot-separated keys: `a.b.c = v` becomes `a → b → c → "v"`.
 *
 * Segments are taken verbatim, so `a..b` nests under an empty-string segment.
 * Every level keeps its segments in first-seen order, integer-like ones included.
 * A path used both as a value and as a parent is a HierarchyError, whichever
 * key comes first.
 */
export function buildHierarchy(entries: Iterable<ConfigEntry>): HierarchyTree {
  const root: HierarchyTree = new Map()
  // first key that created each nested mapping, for conflict messages
  const creators = new Map<HierarchyTree, string>()

  for (const [key, value] of entries) {
    const path = key.split(KEY_SEPARATOR)
    const leaf = path[path.length - 1] ?? key
    let node = root

    for (const [depth, segment] of path.slice(0, -1).entries()) {
      const next = node.get(segment)

      if (next === undefined) {
        const created: HierarchyTree = new Map()
        node.set(segment, created)
        creators.set(created, key)
        node = created
      } else if (typeof next === "string") {
        throw HierarchyError.scalarPrefix(key, path.slice(0, depth + 1).join(KEY_SEPARATOR))
      } else {
        node = next
      }
    }

    const existing = node.get(leaf)

    if (existing !== undefined && typeof existing !== "string") {
      throw HierarchyError.nestedLeaf(key, creators.get(existing) ?? key)
    }

    node.set(leaf, value)
  }

  return root
}

/**
 * Inverse of buildHierarchy: leaves become `[dotted.path, value]` pairs in tree order.
 */
export function flattenHierarchy(tree: HierarchyTree, prefix: string[] = []): ConfigEntry[] {
  const entries: ConfigEntry[] = []

  for (const [segment, node] of tree) {
    const path = [...prefix, segment]

    if (typeof node === "string") {
      entries.push([path.join(KEY_SEPARATOR), node])
    } else {
      entries.push(...flattenHierarchy(node, path))
    }
  }

  return entries
}

/**
 * JSON text of a hierarchy, laid out like `JSON.stringify(value, null, indent)`
 * but with members in tree order. A plain object would list integer-like keys first.
 */
export function stringifyHierarchy(tree: HierarchyTree, indent = 0): string {
  return stringifyNode(tree, " ".repeat(indent), "")
}

function stringifyNode(node: HierarchyNode, step: string, margin: string): string {
  if (typeof node === "string") return JSON.stringify(node)
  if (node.size === 0) return "{}"

  const inner = margin + step
  const colon = step === "" ? ":" : ": "
  const members = [...node].map(
    ([segment, child]) => `${JSON.stringify(segment)}${colon}${stringifyNode(child, step, inner)}`,
  )

  return step === ""
    ? `{${members.join(",")}}`
    : `{\n${inner}${members.join(`,\n${inner}`)}\n${margin}}`
}
