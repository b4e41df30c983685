export type HierarchyNode = string | HierarchyTree

/** Segment to child, in first-seen order. */
export type HierarchyTree = Map<string, HierarchyNode>
