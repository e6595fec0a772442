/**
 * formatgen
 *
 * Compiles a registry of mutually-referencing data types into an emission order, per-reference
 * layout decisions and forward declarations, and encodes values of those types in the BCS and
 * Bincode wire formats.
 *
 * @example
 * ```ts
 * import { Containers, Formats, Registry, compileRegistry, encodeValue } from "formatgen"
 *
 * const registry = new Registry()
 *   .add("List", Containers.struct({ value: Formats.scalar("u32"), next: Formats.option(Formats.typeName("List")) }))
 *
 * const { order, layout } = compileRegistry(registry)
 * layout.isIndirect("List", ".next?") // true: List is not complete while it is being defined
 *
 * encodeValue(registry, "List", { value: 1, next: null }, "bcs")
 * // Uint8Array [1, 0, 0, 0, 0]
 * ```
 */

// Errors
export * from "./types"

// Schema model, registry and interchange document
export * from "./format"

// Dependency analysis, ordering and layout
export * from "./analyzer"

// Binary runtime
export * from "./serde"

// Registry-driven value codec
export * from "./codec"

// Code generation
export * from "./generate"
