/**
 * Scalar format kinds. Each maps to a single primitive call of the runtime.
 */
export type ScalarKind = "unit" | "bool" | "i8" | "i16" | "i32" | "i64" | "i128" | "u8" | "u16" | "u32" | "u64" | "u128" | "f32" | "f64" | "char" | "str" | "bytes"

export const SCALAR_KINDS: readonly ScalarKind[] = [
  "unit",
  "bool",
  "i8",
  "i16",
  "i32",
  "i64",
  "i128",
  "u8",
  "u16",
  "u32",
  "u64",
  "u128",
  "f32",
  "f64",
  "char",
  "str",
  "bytes",
] as const

export interface ScalarFormat {
  kind: ScalarKind
}

/** Reference to another registry entry, resolved by name */
export interface TypeNameFormat {
  kind: "typeName"
  name: string
}

export interface OptionFormat {
  kind: "option"
  format: Format
}

/** Variable-length homogeneous sequence */
export interface SeqFormat {
  kind: "seq"
  format: Format
}

/** Association with unique keys */
export interface MapFormat {
  kind: "map"
  key: Format
  value: Format
}

/** Fixed heterogeneous sequence */
export interface TupleFormat {
  kind: "tuple"
  formats: Format[]
}

/** Fixed-length homogeneous sequence */
export interface FixedArrayFormat {
  kind: "fixedArray"
  content: Format
  size: number
}

/**
 * Placeholder left behind by schema extraction when a type could not be inferred.
 * Never valid input to the compiler.
 */
export interface VariableFormat {
  kind: "variable"
}

/**
 * A type expression
 */
export type Format = ScalarFormat | TypeNameFormat | OptionFormat | SeqFormat | MapFormat | TupleFormat | FixedArrayFormat | VariableFormat

/**
 * An order-preserving (name, value) pair. Order is the on-the-wire order of fields and variants.
 */
export interface Named<T> {
  name: string
  value: T
}

/**
 * Payload shape of one enum variant
 */
export type VariantFormat =
  | { kind: "unit" }
  | { kind: "newType"; format: Format }
  | { kind: "tuple"; formats: Format[] }
  | { kind: "struct"; fields: Named<Format>[] }
  | VariableFormat

/**
 * Top-level shape of one named type
 */
export type ContainerFormat =
  | { kind: "unitStruct" }
  | { kind: "newTypeStruct"; format: Format }
  | { kind: "tupleStruct"; formats: Format[] }
  | { kind: "struct"; fields: Named<Format>[] }
  | { kind: "enum"; variants: ReadonlyMap<number, Named<VariantFormat>> }

/**
 * Derived mapping from a definition name to the names it references
 */
export type DependencyMap = ReadonlyMap<string, ReadonlySet<string>>

/**
 * One step on the way from a definition root to a nested format
 */
export type PathSegment =
  | { kind: "field"; name: string }
  | { kind: "variant"; name: string; index: number }
  | { kind: "element"; index: number }
  | { kind: "option" }
  | { kind: "seq" }
  | { kind: "mapKey" }
  | { kind: "mapValue" }
  | { kind: "fixedArray"; size: number }

/**
 * Format constructors
 */
export const Formats = {
  scalar: (kind: ScalarKind): ScalarFormat => ({ kind }),
  typeName: (name: string): TypeNameFormat => ({ kind: "typeName", name }),
  option: (format: Format): OptionFormat => ({ kind: "option", format }),
  seq: (format: Format): SeqFormat => ({ kind: "seq", format }),
  map: (key: Format, value: Format): MapFormat => ({ kind: "map", key, value }),
  tuple: (formats: Format[]): TupleFormat => ({ kind: "tuple", formats }),
  fixedArray: (content: Format, size: number): FixedArrayFormat => ({ kind: "fixedArray", content, size }),
  unknown: (): VariableFormat => ({ kind: "variable" }),
} as const

/**
 * Container constructors
 */
export const Containers = {
  unitStruct: (): ContainerFormat => ({ kind: "unitStruct" }),
  newTypeStruct: (format: Format): ContainerFormat => ({ kind: "newTypeStruct", format }),
  tupleStruct: (formats: Format[]): ContainerFormat => ({ kind: "tupleStruct", formats }),
  struct: (fields: Record<string, Format> | Named<Format>[]): ContainerFormat => ({ kind: "struct", fields: toNamed(fields) }),
  /**
   * Build an enum from variants listed in index order
   */
  enum: (variants: Record<string, VariantFormat> | Named<VariantFormat>[]): ContainerFormat => ({
    kind: "enum",
    variants: new Map(toNamed(variants).map((variant, index): [number, Named<VariantFormat>] => [index, variant])),
  }),
} as const

/**
 * Variant constructors
 */
export const Variants = {
  unit: (): VariantFormat => ({ kind: "unit" }),
  newType: (format: Format): VariantFormat => ({ kind: "newType", format }),
  tuple: (formats: Format[]): VariantFormat => ({ kind: "tuple", formats }),
  struct: (fields: Record<string, Format> | Named<Format>[]): VariantFormat => ({ kind: "struct", fields: toNamed(fields) }),
} as const

function toNamed<T>(entries: Record<string, T> | Named<T>[]): Named<T>[] {
  if (Array.isArray(entries)) return entries
  return Object.entries(entries).map(([name, value]) => ({ name, value }))
}

export function isScalarKind(kind: string): kind is ScalarKind {
  return SCALAR_KINDS.some((scalar) => scalar === kind)
}
