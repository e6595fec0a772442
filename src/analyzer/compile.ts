import { SchemaError } from "../types"
import type { Registry } from "../format/registry"
import type { DependencyMap } from "../format/types"
import { getDependencyMap } from "./dependencies"
import { bestEffortTopologicalSort } from "./topological-sort"
import { resolveLayout, type Layout } from "./layout"

export interface CompileOptions {
  /** Type names provided by external modules. They may be referenced but are not laid out. */
  externalNames?: Iterable<string>
}

/**
 * Everything a backend needs to emit declarations for a registry
 */
export interface CompiledRegistry {
  registry: Registry
  /** Names each definition references, external names included */
  dependencies: DependencyMap
  /** Emission order: dependencies first wherever cycles allow it */
  order: readonly string[]
  /** By-value or indirection decision for every reference, plus forward declarations */
  layout: Layout
  externalNames: ReadonlySet<string>
}

/**
 * Run the compiler pass over a registry: dependency analysis, best-effort topological sort and
 * layout resolution.
 *
 * The registry is validated up front; a malformed definition aborts the pass before any decision
 * is produced.
 *
 * @throws SchemaError identifying the offending definition
 */
export function compileRegistry(registry: Registry, options: CompileOptions = {}): CompiledRegistry {
  const externalNames = new Set(options.externalNames ?? [])

  for (const name of externalNames) {
    if (registry.has(name)) {
      throw new SchemaError({ message: "also declared as an external definition", code: "DUPLICATE_DEFINITION", definition: name })
    }
  }

  const dependencies = getDependencyMap(registry)

  for (const [name, children] of dependencies) {
    for (const child of children) {
      if (!registry.has(child) && !externalNames.has(child)) {
        throw new SchemaError({ message: `reference to unknown type "${child}"`, code: "UNKNOWN_TYPE_NAME", definition: name })
      }
    }
  }

  // External definitions are complete already and take no part in the ordering
  const graph = new Map<string, Set<string>>()
  for (const [name, children] of dependencies) {
    graph.set(name, new Set([...children].filter((child) => registry.has(child))))
  }

  const order = bestEffortTopologicalSort(graph)
  const layout = resolveLayout(registry, order, { externalNames })

  return { registry, dependencies, order, layout, externalNames }
}
