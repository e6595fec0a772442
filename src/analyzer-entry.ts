/**
 * formatgen/analyzer
 *
 * The compiler pass alone: dependency analysis, best-effort topological sort and layout resolution.
 *
 * @example
 * ```ts
 * import { bestEffortTopologicalSort } from "formatgen/analyzer"
 *
 * bestEffortTopologicalSort(new Map([[1, new Set([2, 3])], [2, new Set()], [3, new Set()]]))
 * // [2, 3, 1]
 * ```
 */

export * from "./analyzer"
