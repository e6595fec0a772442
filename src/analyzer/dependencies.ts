import { SchemaError } from "../types"
import type { ContainerFormat, DependencyMap } from "../format/types"
import type { Registry } from "../format/registry"
import { visitContainer } from "../format/visit"
import { compareKeys } from "./topological-sort"

/**
 * Collect the names a definition syntactically references, at any nesting depth.
 * A definition referencing itself is its own dependency.
 * @returns The referenced names, sorted
 */
export function getDependencies(container: ContainerFormat): Set<string> {
  const names: string[] = []

  visitContainer(container, (format) => {
    if (format.kind === "typeName" && !names.includes(format.name)) {
      names.push(format.name)
    }
  })

  return new Set(names.sort(compareKeys))
}

/**
 * Build a map of dependencies between the entries of a registry.
 *
 * An entry `x` depends on `y` iff the container format of `x` contains a reference to `y`.
 * Dependencies matter for targets where inductive definitions need explicit indirections
 * to keep object sizes finite.
 *
 * @throws SchemaError naming the definition whose format is malformed
 */
export function getDependencyMap(registry: Registry): Map<string, Set<string>> {
  const children = new Map<string, Set<string>>()

  for (const [name, container] of registry.entries()) {
    try {
      children.set(name, getDependencies(container))
    } catch (err) {
      throw SchemaError.from(err, name)
    }
  }

  return children
}

/**
 * Recursively collect all dependencies for a set of definitions
 * @param registry - The registry containing the definitions
 * @param names - The definition names to collect dependencies for; unknown names are skipped
 * @param dependencies - Precomputed dependency map, if available
 * @returns Requested names followed by their transitive dependencies, each once
 */
export function collectDependencies(registry: Registry, names: string[], dependencies: DependencyMap = getDependencyMap(registry)): string[] {
  const collected = new Set<string>()
  const visited = new Set<string>()

  function collect(name: string) {
    if (visited.has(name)) return
    visited.add(name)

    for (const dependency of dependencies.get(name) ?? []) {
      if (registry.has(dependency)) {
        collected.add(dependency)
        collect(dependency)
      }
    }
  }

  // Start with the requested definitions
  for (const name of names) {
    if (registry.has(name)) {
      collected.add(name)
    }
  }

  for (const name of names) {
    if (registry.has(name)) {
      collect(name)
    }
  }

  return Array.from(collected)
}
