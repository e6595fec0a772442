/**
 * formatgen/runtime
 *
 * Everything generated modules import at run time: registry parsing, the binary serializers and the
 * value codec.
 */

export { SerializationError, DeserializationError, SchemaError, type Encoding } from "./types"

export { Registry, parseRegistry, parseRegistryJson } from "./format"

export * from "./serde"

export * from "./codec"
