import * as z from "zod"
import { SchemaError } from "../types"
import { enumVariants } from "./visit"
import { Registry } from "./registry"
import { SCALAR_KINDS, type ContainerFormat, type Format, type Named, type ScalarKind, type VariantFormat } from "./types"

/**
 * Interchange spelling of a format, e.g. `"U64"` or `{ "SEQ": { "TYPENAME": "Node" } }`
 */
export type FormatDocument =
  | Uppercase<ScalarKind>
  | { TYPENAME: string }
  | { OPTION: FormatDocument }
  | { SEQ: FormatDocument }
  | { MAP: { KEY: FormatDocument; VALUE: FormatDocument } }
  | { TUPLE: FormatDocument[] }
  | { TUPLEARRAY: { CONTENT: FormatDocument; SIZE: number } }

export type NamedDocument<T> = { [name: string]: T }

export type VariantDocument = "UNIT" | { NEWTYPE: FormatDocument } | { TUPLE: FormatDocument[] } | { STRUCT: NamedDocument<FormatDocument>[] }

export type ContainerDocument =
  | "UNITSTRUCT"
  | { NEWTYPESTRUCT: FormatDocument }
  | { TUPLESTRUCT: FormatDocument[] }
  | { STRUCT: NamedDocument<FormatDocument>[] }
  | { ENUM: { [index: string]: NamedDocument<VariantDocument> } }

/**
 * A registry as exchanged with schema producers: definition name to tagged container
 */
export type RegistryDocument = { [name: string]: ContainerDocument }

const SCALAR_TAGS = SCALAR_KINDS.map((kind) => kind.toUpperCase())

const toScalarKind = (tag: string): ScalarKind => {
  const kind = SCALAR_KINDS.find((candidate) => candidate.toUpperCase() === tag)
  if (!kind) throw new Error(`unknown scalar tag ${tag}`)
  return kind
}

/**
 * Turn a `{ name: value }` object with exactly one key into a Named pair
 */
const singleEntry = <T>(entry: Record<string, T>): Named<T> => {
  const [first] = Object.entries(entry)
  return { name: first[0], value: first[1] }
}

const hasSingleKey = (value: Record<string, unknown>) => Object.keys(value).length === 1

export const FormatSchema: z.ZodType<Format> = z.lazy(() =>
  z.union([
    z
      .string()
      .refine((tag) => SCALAR_TAGS.includes(tag), { message: `Expected one of ${SCALAR_TAGS.join(", ")}` })
      .transform((tag): Format => ({ kind: toScalarKind(tag) })),
    z.strictObject({ TYPENAME: z.string().min(1) }).transform((doc): Format => ({ kind: "typeName", name: doc.TYPENAME })),
    z.strictObject({ OPTION: FormatSchema }).transform((doc): Format => ({ kind: "option", format: doc.OPTION })),
    z.strictObject({ SEQ: FormatSchema }).transform((doc): Format => ({ kind: "seq", format: doc.SEQ })),
    z
      .strictObject({ MAP: z.strictObject({ KEY: FormatSchema, VALUE: FormatSchema }) })
      .transform((doc): Format => ({ kind: "map", key: doc.MAP.KEY, value: doc.MAP.VALUE })),
    z.strictObject({ TUPLE: z.array(FormatSchema) }).transform((doc): Format => ({ kind: "tuple", formats: doc.TUPLE })),
    z
      .strictObject({ TUPLEARRAY: z.strictObject({ CONTENT: FormatSchema, SIZE: z.number().int().nonnegative() }) })
      .transform((doc): Format => ({ kind: "fixedArray", content: doc.TUPLEARRAY.CONTENT, size: doc.TUPLEARRAY.SIZE })),
  ]),
)

const NamedFormatSchema = z
  .record(z.string().min(1), FormatSchema)
  .refine(hasSingleKey, { message: "Expected exactly one field name per entry" })
  .transform(singleEntry)

const FieldsSchema = z.array(NamedFormatSchema)

export const VariantSchema: z.ZodType<VariantFormat> = z.union([
  z.literal("UNIT").transform((): VariantFormat => ({ kind: "unit" })),
  z.strictObject({ NEWTYPE: FormatSchema }).transform((doc): VariantFormat => ({ kind: "newType", format: doc.NEWTYPE })),
  z.strictObject({ TUPLE: z.array(FormatSchema) }).transform((doc): VariantFormat => ({ kind: "tuple", formats: doc.TUPLE })),
  z.strictObject({ STRUCT: FieldsSchema }).transform((doc): VariantFormat => ({ kind: "struct", fields: doc.STRUCT })),
])

const NamedVariantSchema = z
  .record(z.string().min(1), VariantSchema)
  .refine(hasSingleKey, { message: "Expected exactly one variant name per index" })
  .transform(singleEntry)

export const ContainerSchema: z.ZodType<ContainerFormat> = z.union([
  z.enum(["UNITSTRUCT", "UNIT"]).transform((): ContainerFormat => ({ kind: "unitStruct" })),
  z.strictObject({ NEWTYPESTRUCT: FormatSchema }).transform((doc): ContainerFormat => ({ kind: "newTypeStruct", format: doc.NEWTYPESTRUCT })),
  z.strictObject({ NEWTYPE: FormatSchema }).transform((doc): ContainerFormat => ({ kind: "newTypeStruct", format: doc.NEWTYPE })),
  z.strictObject({ TUPLESTRUCT: z.array(FormatSchema) }).transform((doc): ContainerFormat => ({ kind: "tupleStruct", formats: doc.TUPLESTRUCT })),
  z.strictObject({ TUPLE: z.array(FormatSchema) }).transform((doc): ContainerFormat => ({ kind: "tupleStruct", formats: doc.TUPLE })),
  z.strictObject({ STRUCT: FieldsSchema }).transform((doc): ContainerFormat => ({ kind: "struct", fields: doc.STRUCT })),
  z
    .strictObject({ ENUM: z.record(z.string().regex(/^(0|[1-9][0-9]*)$/, { message: "Variant index must be a non-negative integer" }), NamedVariantSchema) })
    .transform((doc): ContainerFormat => ({
      kind: "enum",
      variants: new Map(Object.entries(doc.ENUM).map(([index, variant]): [number, Named<VariantFormat>] => [Number(index), variant])),
    })),
])

export const RegistryDocumentSchema = z.record(z.string().min(1), ContainerSchema)

/**
 * Validate an interchange document and build a registry from it.
 * Definitions keep the document's key order.
 * @throws SchemaError with code INVALID_DOCUMENT when the document is malformed
 */
export function parseRegistry(document: unknown): Registry {
  const result = RegistryDocumentSchema.safeParse(document)
  if (!result.success) {
    throw new SchemaError({ message: `Malformed registry document\n${z.prettifyError(result.error)}`, code: "INVALID_DOCUMENT", cause: result.error })
  }

  const registry = new Registry()
  for (const [name, container] of Object.entries(result.data)) {
    registry.add(name, container)
  }
  return registry
}

/**
 * Parse a JSON interchange document
 */
export function parseRegistryJson(text: string): Registry {
  let document: unknown
  try {
    document = JSON.parse(text)
  } catch (err) {
    throw new SchemaError({ message: `Registry document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, code: "INVALID_DOCUMENT", cause: err })
  }
  return parseRegistry(document)
}

export function formatToDocument(format: Format): FormatDocument {
  switch (format.kind) {
    case "typeName":
      return { TYPENAME: format.name }
    case "option":
      return { OPTION: formatToDocument(format.format) }
    case "seq":
      return { SEQ: formatToDocument(format.format) }
    case "map":
      return { MAP: { KEY: formatToDocument(format.key), VALUE: formatToDocument(format.value) } }
    case "tuple":
      return { TUPLE: format.formats.map(formatToDocument) }
    case "fixedArray":
      return { TUPLEARRAY: { CONTENT: formatToDocument(format.content), SIZE: format.size } }
    case "variable":
      throw new SchemaError({ message: "cannot serialize an unresolved format", code: "UNRESOLVED_FORMAT" })
    default:
      return scalarTag(format.kind)
  }
}

function scalarTag(kind: ScalarKind): Uppercase<ScalarKind> {
  switch (kind) {
    case "unit":
      return "UNIT"
    case "bool":
      return "BOOL"
    case "i8":
      return "I8"
    case "i16":
      return "I16"
    case "i32":
      return "I32"
    case "i64":
      return "I64"
    case "i128":
      return "I128"
    case "u8":
      return "U8"
    case "u16":
      return "U16"
    case "u32":
      return "U32"
    case "u64":
      return "U64"
    case "u128":
      return "U128"
    case "f32":
      return "F32"
    case "f64":
      return "F64"
    case "char":
      return "CHAR"
    case "str":
      return "STR"
    case "bytes":
      return "BYTES"
  }
}

const fieldsToDocument = (fields: readonly Named<Format>[]): NamedDocument<FormatDocument>[] => fields.map((field) => ({ [field.name]: formatToDocument(field.value) }))

function variantToDocument(variant: VariantFormat): VariantDocument {
  switch (variant.kind) {
    case "unit":
      return "UNIT"
    case "newType":
      return { NEWTYPE: formatToDocument(variant.format) }
    case "tuple":
      return { TUPLE: variant.formats.map(formatToDocument) }
    case "struct":
      return { STRUCT: fieldsToDocument(variant.fields) }
    case "variable":
      throw new SchemaError({ message: "cannot serialize an unresolved variant", code: "UNRESOLVED_FORMAT" })
  }
}

export function containerToDocument(container: ContainerFormat): ContainerDocument {
  switch (container.kind) {
    case "unitStruct":
      return "UNITSTRUCT"
    case "newTypeStruct":
      return { NEWTYPESTRUCT: formatToDocument(container.format) }
    case "tupleStruct":
      return { TUPLESTRUCT: container.formats.map(formatToDocument) }
    case "struct":
      return { STRUCT: fieldsToDocument(container.fields) }
    case "enum": {
      const variants: { [index: string]: NamedDocument<VariantDocument> } = {}
      enumVariants(container.variants).forEach((variant, index) => {
        variants[String(index)] = { [variant.name]: variantToDocument(variant.value) }
      })
      return { ENUM: variants }
    }
  }
}

/**
 * Convert a registry back to its interchange document, using the canonical tag spellings
 */
export function registryToDocument(registry: Registry): RegistryDocument {
  const document: RegistryDocument = {}
  for (const [name, container] of registry.entries()) {
    try {
      document[name] = containerToDocument(container)
    } catch (err) {
      throw SchemaError.from(err, name)
    }
  }
  return document
}
