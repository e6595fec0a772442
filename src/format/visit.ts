import { SchemaError } from "../types"
import type { ContainerFormat, Format, Named, PathSegment, VariantFormat } from "./types"

/**
 * Called once per format node, parents before children
 */
export type FormatVisitor = (format: Format, path: readonly PathSegment[]) => void

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/

// Names that are not plain identifiers are quoted, so no two distinct paths render alike
const pathName = (name: string) => (IDENTIFIER.test(name) ? name : JSON.stringify(name))

/**
 * Render a path as a compact string key, e.g. `::Node#1`, `.children[]` or `."a[]"`
 */
export function formatPath(path: readonly PathSegment[]): string {
  return path
    .map((segment) => {
      switch (segment.kind) {
        case "field":
          return `.${pathName(segment.name)}`
        case "variant":
          return `::${pathName(segment.name)}`
        case "element":
          return `#${segment.index}`
        case "option":
          return "?"
        case "seq":
          return "[]"
        case "mapKey":
          return "{key}"
        case "mapValue":
          return "{value}"
        case "fixedArray":
          return `[${segment.size}]`
      }
    })
    .join("")
}

/**
 * Visit a format and every format nested in it.
 * @throws SchemaError when an unresolved placeholder is reached
 */
export function visitFormat(format: Format, visitor: FormatVisitor, path: readonly PathSegment[] = []): void {
  if (format.kind === "variable") {
    throw new SchemaError({ message: `unresolved format at ${formatPath(path) || "<root>"}`, code: "UNRESOLVED_FORMAT" })
  }

  visitor(format, path)

  switch (format.kind) {
    case "option":
      visitFormat(format.format, visitor, [...path, { kind: "option" }])
      return
    case "seq":
      visitFormat(format.format, visitor, [...path, { kind: "seq" }])
      return
    case "map":
      visitFormat(format.key, visitor, [...path, { kind: "mapKey" }])
      visitFormat(format.value, visitor, [...path, { kind: "mapValue" }])
      return
    case "tuple":
      visitFormats(format.formats, visitor, path)
      return
    case "fixedArray":
      visitFormat(format.content, visitor, [...path, { kind: "fixedArray", size: format.size }])
      return
    default:
      // Scalars and type names are leaves
      return
  }
}

function visitFormats(formats: readonly Format[], visitor: FormatVisitor, path: readonly PathSegment[]): void {
  formats.forEach((format, index) => visitFormat(format, visitor, [...path, { kind: "element", index }]))
}

function checkUniqueNames(entries: readonly Named<unknown>[], what: "field" | "variant", path: readonly PathSegment[]): void {
  const seen = new Set<string>()
  for (const { name } of entries) {
    if (seen.has(name)) {
      throw new SchemaError({ message: `duplicate ${what} name "${name}" at ${formatPath(path) || "<root>"}`, code: "DUPLICATE_NAME" })
    }
    seen.add(name)
  }
}

function visitFields(fields: readonly Named<Format>[], visitor: FormatVisitor, path: readonly PathSegment[]): void {
  checkUniqueNames(fields, "field", path)
  for (const field of fields) {
    visitFormat(field.value, visitor, [...path, { kind: "field", name: field.name }])
  }
}

/**
 * Visit every format inside one variant payload
 */
export function visitVariant(variant: VariantFormat, visitor: FormatVisitor, path: readonly PathSegment[] = []): void {
  switch (variant.kind) {
    case "unit":
      return
    case "newType":
      visitFormat(variant.format, visitor, path)
      return
    case "tuple":
      visitFormats(variant.formats, visitor, path)
      return
    case "struct":
      visitFields(variant.fields, visitor, path)
      return
    case "variable":
      throw new SchemaError({ message: `unresolved variant at ${formatPath(path) || "<root>"}`, code: "UNRESOLVED_FORMAT" })
  }
}

/**
 * Visit every format reachable from a top-level definition.
 * Enum variant indices and the uniqueness of field and variant names are checked before
 * anything below them is visited.
 */
export function visitContainer(container: ContainerFormat, visitor: FormatVisitor): void {
  switch (container.kind) {
    case "unitStruct":
      return
    case "newTypeStruct":
      visitFormat(container.format, visitor, [])
      return
    case "tupleStruct":
      visitFormats(container.formats, visitor, [])
      return
    case "struct":
      visitFields(container.fields, visitor, [])
      return
    case "enum": {
      const variants = enumVariants(container.variants)
      checkUniqueNames(variants, "variant", [])
      variants.forEach((variant, index) => {
        visitVariant(variant.value, visitor, [{ kind: "variant", name: variant.name, index }])
      })
      return
    }
  }
}

/**
 * Return the variants of an enum in index order.
 * @throws SchemaError unless the indices form the dense sequence `0..n`
 */
export function enumVariants(variants: ReadonlyMap<number, Named<VariantFormat>>): Named<VariantFormat>[] {
  const result: Named<VariantFormat>[] = []

  for (let expected = 0; expected < variants.size; expected++) {
    const variant = variants.get(expected)
    if (!variant) {
      const indices = [...variants.keys()].sort((a, b) => a - b).join(", ")
      throw new SchemaError({ message: `variant indices must be 0..${variants.size - 1}, found [${indices}]`, code: "SPARSE_VARIANT_INDEX" })
    }
    result.push(variant)
  }

  return result
}
