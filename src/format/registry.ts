import { SchemaError } from "../types"
import type { ContainerFormat } from "./types"
import { registryToDocument, type RegistryDocument } from "./document"
import { collectDependencies } from "../analyzer/dependencies"

/**
 * An ordered collection of named type definitions forming one schema.
 *
 * A registry is built once by a schema producer (usually through `parseRegistry`) and then treated
 * as immutable input: the compiler only derives auxiliary structures from it.
 */
export class Registry {
  private _definitions: Map<string, ContainerFormat> = new Map()

  /**
   * Create a registry from `[name, container]` pairs
   */
  static fromEntries(entries: Iterable<readonly [string, ContainerFormat]>): Registry {
    const registry = new Registry()
    for (const [name, container] of entries) {
      registry.add(name, container)
    }
    return registry
  }

  /**
   * Register a definition
   * @param name - Unique type name
   * @param container - Shape of the type
   * @returns this for method chaining
   */
  add(name: string, container: ContainerFormat): this {
    if (!name) {
      throw new SchemaError({ message: "Definition name must not be empty", code: "INVALID_DOCUMENT" })
    }
    if (this._definitions.has(name)) {
      throw new SchemaError({ message: "defined more than once", code: "DUPLICATE_DEFINITION", definition: name })
    }

    this._definitions.set(name, container)
    return this
  }

  /**
   * Get a definition by name
   */
  get(name: string): ContainerFormat | undefined {
    return this._definitions.get(name)
  }

  /**
   * Get a definition that is known to exist
   * @throws SchemaError with code UNKNOWN_TYPE_NAME otherwise
   */
  require(name: string): ContainerFormat {
    const container = this._definitions.get(name)
    if (!container) {
      throw new SchemaError({ message: `Unknown type name "${name}"`, code: "UNKNOWN_TYPE_NAME" })
    }
    return container
  }

  has(name: string): boolean {
    return this._definitions.has(name)
  }

  /**
   * Definition names in registration order
   */
  names(): IterableIterator<string> {
    return this._definitions.keys()
  }

  values(): IterableIterator<ContainerFormat> {
    return this._definitions.values()
  }

  entries(): IterableIterator<[string, ContainerFormat]> {
    return this._definitions.entries()
  }

  [Symbol.iterator](): IterableIterator<[string, ContainerFormat]> {
    return this.entries()
  }

  /**
   * Number of definitions
   */
  get size(): number {
    return this._definitions.size
  }

  /**
   * Collect the given names and every definition they transitively depend on
   * @param names - Names to start from
   * @returns Requested names first, then their dependencies in discovery order
   */
  collectDependencies(names: string[]): string[] {
    return collectDependencies(this, names)
  }

  /**
   * Create a new registry containing only the specified definitions and their dependencies
   * @param names - The definition names to include
   * @returns A new registry, in this registry's order
   */
  subset(names: string[]): Registry {
    const included = new Set(this.collectDependencies(names))
    const subset = new Registry()

    for (const [name, container] of this._definitions) {
      if (included.has(name)) {
        subset.add(name, container)
      }
    }

    return subset
  }

  /**
   * Convert to the interchange document
   */
  toDocument(): RegistryDocument {
    return registryToDocument(this)
  }
}
