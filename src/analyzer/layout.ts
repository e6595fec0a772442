import { LayoutError, SchemaError } from "../types"
import type { Registry } from "../format/registry"
import type { ContainerFormat, PathSegment } from "../format/types"
import { formatPath, visitContainer } from "../format/visit"
import { compareKeys } from "./topological-sort"

/**
 * One occurrence of a type name inside a definition, with the decision taken for it
 */
export interface ReferenceSite {
  /** Position of the reference inside its definition, e.g. `.next?` or `::Node#1` */
  path: string
  /** The same position as structured segments */
  segments: readonly PathSegment[]
  /** Referenced type name */
  target: string
  /** Whether the reference must be stored behind an indirection (boxed, shared pointer, ...) */
  indirect: boolean
  /** Whether the target is provided outside the registry */
  external: boolean
  /**
   * Whether a sequence or map encloses the reference. Backends whose variable-length containers
   * already live on the heap may skip the indirection in that case; the decision above does not.
   */
  enclosedByVariableLength: boolean
}

/**
 * Layout decisions for one definition
 */
export interface DefinitionLayout {
  name: string
  container: ContainerFormat
  /** Names that must be forward-declared before this definition is emitted */
  forwardDeclarations: readonly string[]
  /** Every reference site, in traversal order */
  references: readonly ReferenceSite[]
  /** The reference sites that must go through an indirection */
  indirections: readonly ReferenceSite[]
}

/**
 * Accumulators threaded through one layout pass
 */
export interface LayoutState {
  /** Definitions already emitted, which may be embedded by value from now on */
  knownSizes: Set<string>
  /** Definitions already declared, either fully or forward */
  declared: Set<string>
  /** Names defined outside the registry, always complete */
  externalNames: ReadonlySet<string>
}

export interface LayoutOptions {
  /** Type names provided by external modules */
  externalNames?: Iterable<string>
}

export function createLayoutState(externalNames: Iterable<string> = []): LayoutState {
  return { knownSizes: new Set(), declared: new Set(), externalNames: new Set(externalNames) }
}

const isVariableLength = (segment: PathSegment) => segment.kind === "seq" || segment.kind === "mapKey" || segment.kind === "mapValue"

/**
 * Decide the layout of a single definition, then record it as known in `state`.
 *
 * Every reference to a definition that is not known yet must go through an indirection, and any
 * such definition that was never declared gets a forward declaration.
 */
export function resolveDefinitionLayout(name: string, container: ContainerFormat, state: LayoutState): DefinitionLayout {
  const references: ReferenceSite[] = []

  try {
    visitContainer(container, (format, segments) => {
      if (format.kind !== "typeName") return

      const external = state.externalNames.has(format.name)
      references.push({
        path: formatPath(segments),
        segments,
        target: format.name,
        indirect: !external && !state.knownSizes.has(format.name),
        external,
        enclosedByVariableLength: segments.some(isVariableLength),
      })
    })
  } catch (err) {
    throw SchemaError.from(err, name)
  }

  const pending = [...new Set(references.filter((site) => !site.external).map((site) => site.target))]
  const forwardDeclarations = pending.filter((target) => !state.declared.has(target)).sort(compareKeys)
  for (const target of forwardDeclarations) {
    state.declared.add(target)
  }

  state.knownSizes.add(name)
  state.declared.add(name)

  const indirections = references.filter((site) => site.indirect)
  return { name, container, forwardDeclarations, references, indirections }
}

/**
 * The decision table handed to backends: for every definition in emission order, which references
 * need an indirection and which names need a forward declaration.
 */
export class Layout {
  readonly #definitions: Map<string, DefinitionLayout> = new Map()
  readonly #sites: Map<string, Map<string, ReferenceSite>> = new Map()

  /** Definitions with a direct representation once the pass completes */
  readonly knownSizes: ReadonlySet<string>

  constructor(definitions: readonly DefinitionLayout[], knownSizes: ReadonlySet<string>) {
    for (const definition of definitions) {
      this.#definitions.set(definition.name, definition)
      this.#sites.set(definition.name, new Map(definition.references.map((site): [string, ReferenceSite] => [site.path, site])))
    }
    this.knownSizes = knownSizes
  }

  /**
   * Definition names in emission order
   */
  get order(): string[] {
    return [...this.#definitions.keys()]
  }

  /**
   * Definition layouts in emission order
   */
  definitions(): IterableIterator<DefinitionLayout> {
    return this.#definitions.values()
  }

  get(name: string): DefinitionLayout | undefined {
    return this.#definitions.get(name)
  }

  /**
   * Look up the decision for one reference site
   * @param definition - Name of the definition containing the reference
   * @param path - Site path as produced by `formatPath`
   * @throws LayoutError when the definition has no reference at that path
   */
  isIndirect(definition: string, path: string): boolean {
    const site = this.#sites.get(definition)?.get(path)
    if (!site) {
      throw new LayoutError(`No type reference at "${path}" in definition "${definition}"`)
    }
    return site.indirect
  }

  /**
   * Every reference requiring an indirection, as `[definition, site]` pairs in emission order
   */
  indirectReferences(): [string, ReferenceSite][] {
    const result: [string, ReferenceSite][] = []
    for (const definition of this.#definitions.values()) {
      for (const site of definition.indirections) {
        result.push([definition.name, site])
      }
    }
    return result
  }
}

/**
 * Scan definitions in `order`, deciding by-value or indirection for every type reference.
 * @param registry - Definitions to lay out
 * @param order - Emission order, normally the best-effort topological sort of the registry
 * @throws SchemaError for malformed definitions, unknown names in `order` or unknown reference targets
 */
export function resolveLayout(registry: Registry, order: readonly string[], options: LayoutOptions = {}): Layout {
  const state = createLayoutState(options.externalNames)
  const definitions: DefinitionLayout[] = []

  for (const name of order) {
    const container = registry.get(name)
    if (!container) {
      throw new SchemaError({ message: `Unknown type name "${name}" in layout order`, code: "UNKNOWN_TYPE_NAME" })
    }

    const layout = resolveDefinitionLayout(name, container, state)
    const dangling = layout.references.find((site) => !site.external && !registry.has(site.target))
    if (dangling) {
      throw new SchemaError({ message: `reference to unknown type "${dangling.target}" at ${dangling.path}`, code: "UNKNOWN_TYPE_NAME", definition: name })
    }

    definitions.push(layout)
  }

  return new Layout(definitions, state.knownSizes)
}
