/**
 * Total order on graph nodes, used for every tie-break
 */
export type Compare<T> = (a: T, b: T) => number

/**
 * Default node order: numbers numerically, strings by code unit, anything else by its string form
 */
export function compareKeys(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b
  }
  const left = typeof a === "string" ? a : String(a)
  const right = typeof b === "string" ? b : String(b)
  return left < right ? -1 : left > right ? 1 : 0
}

/**
 * Classic topological sorting algorithm except that it doesn't abort in case of cycles.
 *
 * Nodes are ordered so that, whenever possible, a node comes after all of its children. A node met
 * a second time before all of its children are sorted is accepted anyway: this breaks the cycle at
 * that node, and the edges going back to it are the ones ignored from then on.
 *
 * Edges to nodes that are not keys of `children` are ignored.
 *
 * @param children - Map from each node to the nodes it depends on
 * @param compare - Order used to break ties between nodes
 * @returns Every key of `children` exactly once
 */
export function bestEffortTopologicalSort<T>(children: ReadonlyMap<T, ReadonlySet<T>>, compare: Compare<T> = compareKeys): T[] {
  const outDegree = (node: T) => children.get(node)?.size ?? 0

  // Build the initial stack so that nodes with more children are expanded first (and otherwise
  // those with smaller key first). This is a heuristic to break cycles preferably at large nodes:
  // a large node revisited early is the one whose incoming edges end up ignored.
  const stack = [...children.keys()]
    .sort(compare)
    .reverse()
    .sort((a, b) => outDegree(a) - outDegree(b))

  const result: T[] = []
  // Nodes already inserted in result
  const sorted = new Set<T>()
  // Nodes for which children have been pushed
  const seen = new Set<T>()

  while (stack.length > 0) {
    const node = stack[stack.length - 1]
    stack.pop()

    if (sorted.has(node)) {
      continue
    }

    if (seen.has(node)) {
      // Second visit. Either all children are sorted by now, or some child depends back on
      // `node` and is still pending: the cycle is broken here.
      sorted.add(node)
      result.push(node)
      continue
    }

    // First visit: schedule the node for a second visit after its unseen children, which
    // are then popped by increasing key.
    seen.add(node)
    stack.push(node)
    const pending = [...(children.get(node) ?? [])].filter((child) => children.has(child) && !seen.has(child)).sort(compare)
    for (let i = pending.length - 1; i >= 0; i--) {
      stack.push(pending[i])
    }
  }

  return result
}
