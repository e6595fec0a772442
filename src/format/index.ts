// Types
export type {
  ContainerFormat,
  DependencyMap,
  FixedArrayFormat,
  Format,
  MapFormat,
  Named,
  OptionFormat,
  PathSegment,
  ScalarFormat,
  ScalarKind,
  SeqFormat,
  TupleFormat,
  TypeNameFormat,
  VariableFormat,
  VariantFormat,
} from "./types"
export { Containers, Formats, Variants, SCALAR_KINDS, isScalarKind } from "./types"

// Registry
export { Registry } from "./registry"

// Traversal
export { visitFormat, visitVariant, visitContainer, enumVariants, formatPath, type FormatVisitor } from "./visit"

// Interchange document
export {
  parseRegistry,
  parseRegistryJson,
  registryToDocument,
  formatToDocument,
  containerToDocument,
  FormatSchema,
  VariantSchema,
  ContainerSchema,
  RegistryDocumentSchema,
  type ContainerDocument,
  type FormatDocument,
  type NamedDocument,
  type RegistryDocument,
  type VariantDocument,
} from "./document"
