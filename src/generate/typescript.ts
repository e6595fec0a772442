import type { Registry } from "../format/registry"
import type { ContainerFormat, Format, Named, VariantFormat } from "../format/types"
import { enumVariants } from "../format/visit"
import { compileRegistry, type CompiledRegistry } from "../analyzer/compile"
import { collectDependencies } from "../analyzer/dependencies"
import { createConfig, type CodeGeneratorConfig, type CodeGeneratorConfigInput } from "./config"

/**
 * Generate indentation spaces
 */
const space = (depth: number) => " ".repeat(depth)

const isIdentifier = (name: string) => /^[A-Za-z_$][A-Za-z0-9_$]*$/.test(name)

/**
 * Property key, quoted when it is not a plain identifier
 */
const propertyKey = (name: string) => (isIdentifier(name) ? name : JSON.stringify(name))

/**
 * Namespace alias for an external module, from the last segment of its specifier
 */
function moduleAlias(specifier: string): string {
  const segment = specifier.split("/").filter((part) => part && part !== "." && part !== "..").pop() ?? "external"
  const alias = segment.replace(/[^A-Za-z0-9_$]/g, "_")
  return /^[0-9]/.test(alias) ? `_${alias}` : alias
}

/**
 * Format a JSDoc comment
 */
function formatJsDoc(text: string | undefined, depth: number = 0): string {
  if (!text) {
    return ""
  }
  const indent = space(depth)
  return `${indent}/**\n${indent} * ${text.split("\n").join(`\n${indent} * `)}\n${indent} */\n`
}

/**
 * Emits TypeScript declarations, and optionally encode/decode helpers, for a registry.
 *
 * Declarations follow the best-effort topological order of the registry. TypeScript object types are
 * references already, so reference sites needing an indirection need no extra syntax.
 *
 * @example
 * const generator = new TypeScriptGenerator({ moduleName: "shapes" })
 * const source = generator.output(registry)
 */
export class TypeScriptGenerator {
  readonly config: CodeGeneratorConfig

  /** External type name to its qualified name */
  readonly #qualifiedNames: Map<string, string> = new Map()

  constructor(config: CodeGeneratorConfigInput) {
    this.config = createConfig(config)
    for (const [specifier, names] of Object.entries(this.config.externalDefinitions)) {
      for (const name of names) {
        this.#qualifiedNames.set(name, `${moduleAlias(specifier)}.${name}`)
      }
    }
  }

  /**
   * Generate the source of one module
   * @throws SchemaError when the registry does not compile
   */
  output(registry: Registry): string {
    const compiled = compileRegistry(registry, { externalNames: this.#qualifiedNames.keys() })
    const usedComments = new Set<string>()
    const comment = (path: string) => {
      const text = this.config.comments[path]
      if (text !== undefined) usedComments.add(path)
      return text
    }

    const sections = [this.#header(), this.#imports(compiled)]
    for (const name of compiled.order) {
      sections.push(this.#declaration(name, registry.require(name), comment))
    }
    if (this.config.serialization) {
      sections.push(this.#helpers(compiled))
    }

    for (const path of Object.keys(this.config.comments)) {
      if (!usedComments.has(path)) {
        console.warn(`[formatgen] Comment for unknown path "${path}" in module "${this.config.moduleName}" was not emitted`)
      }
    }

    return `${sections.filter(Boolean).join("\n\n")}\n`
  }

  #header(): string {
    return `// Generated by formatgen for module "${this.config.moduleName}". Do not edit.`
  }

  #imports(compiled: CompiledRegistry): string {
    const lines: string[] = []

    const referenced = new Set<string>()
    for (const children of compiled.dependencies.values()) {
      for (const child of children) {
        if (compiled.externalNames.has(child)) referenced.add(child)
      }
    }
    for (const [specifier, names] of Object.entries(this.config.externalDefinitions)) {
      if (names.some((name) => referenced.has(name))) {
        lines.push(`import type * as ${moduleAlias(specifier)} from ${JSON.stringify(specifier)}`)
      }
    }

    if (this.config.serialization) {
      lines.push(`import { decodeValue, encodeValue, parseRegistry } from ${JSON.stringify(this.config.runtimeModule)}`)
    }

    return lines.join("\n")
  }

  #typeName(name: string): string {
    return this.#qualifiedNames.get(name) ?? name
  }

  /**
   * Convert a format to a TypeScript type expression
   */
  #toTs(format: Format): string {
    switch (format.kind) {
      case "unit":
        return "null"
      case "bool":
        return "boolean"
      case "i8":
      case "i16":
      case "i32":
      case "u8":
      case "u16":
      case "u32":
      case "f32":
      case "f64":
        return "number"
      case "i64":
      case "i128":
      case "u64":
      case "u128":
        return "bigint"
      case "char":
      case "str":
        return "string"
      case "bytes":
        return "Uint8Array"
      case "typeName":
        return this.#typeName(format.name)
      case "option":
        return `${this.#toTs(format.format)} | null`
      case "seq":
      case "fixedArray": {
        const items = this.#toTs(format.kind === "seq" ? format.format : format.content)
        // Only wrap in parentheses if it's a union
        return items.includes(" | ") ? `(${items})[]` : `${items}[]`
      }
      case "map":
        return `Map<${this.#toTs(format.key)}, ${this.#toTs(format.value)}>`
      case "tuple":
        return this.#tuple(format.formats)
      case "variable":
        // Rejected by compileRegistry before any declaration is emitted
        return "unknown"
    }
  }

  #tuple(formats: readonly Format[]): string {
    return `[${formats.map((format) => this.#toTs(format)).join(", ")}]`
  }

  #fields(fields: readonly Named<Format>[], depth: number, comment?: (field: string) => string | undefined): string {
    if (fields.length === 0) {
      return "{}"
    }
    const properties = fields.map((field) => `${formatJsDoc(comment?.(field.name), depth + 2)}${space(depth + 2)}${propertyKey(field.name)}: ${this.#toTs(field.value)}`)
    return `{\n${properties.join("\n")}\n${space(depth)}}`
  }

  #variant(variant: VariantFormat): string {
    switch (variant.kind) {
      case "unit":
        return "null"
      case "newType":
        return this.#toTs(variant.format)
      case "tuple":
        return this.#tuple(variant.formats)
      case "struct":
        if (variant.fields.length === 0) return "{}"
        return `{ ${variant.fields.map((field) => `${propertyKey(field.name)}: ${this.#toTs(field.value)}`).join("; ")} }`
      case "variable":
        return "unknown"
    }
  }

  #body(name: string, container: ContainerFormat, comment: (path: string) => string | undefined): string {
    switch (container.kind) {
      case "unitStruct":
        return "null"
      case "newTypeStruct":
        return this.#toTs(container.format)
      case "tupleStruct":
        return this.#tuple(container.formats)
      case "struct":
        return this.#fields(container.fields, 0, (field) => comment(`${name}.${field}`))
      case "enum": {
        const variants = enumVariants(container.variants)
        if (variants.length === 0) {
          return "never"
        }
        const lines = variants.map(
          (variant) => `${formatJsDoc(comment(`${name}.${variant.name}`), 2)}${space(2)}| { ${propertyKey(variant.name)}: ${this.#variant(variant.value)} }`,
        )
        return `\n${lines.join("\n")}`
      }
    }
  }

  #declaration(name: string, container: ContainerFormat, comment: (path: string) => string | undefined): string {
    const jsDoc = formatJsDoc(comment(name))
    const body = this.#body(name, container, comment)
    return `${jsDoc}export type ${name} =${body.startsWith("\n") ? "" : " "}${body}`
  }

  /**
   * Embedded registry plus one encode/decode pair per definition. Definitions depending on external
   * types are skipped: their formats are not part of the embedded registry.
   */
  #helpers(compiled: CompiledRegistry): string {
    const { registry, dependencies, externalNames } = compiled
    const encodings = this.config.encodings
    const encodingType = encodings.map((encoding) => JSON.stringify(encoding)).join(" | ")
    const defaultEncoding = JSON.stringify(encodings[0])

    const parts = [`const registry = parseRegistry(${JSON.stringify(registry.toDocument(), null, 2)})`]

    for (const name of compiled.order) {
      const closure = collectDependencies(registry, [name], dependencies)
      const external = closure.flatMap((member) => [...(dependencies.get(member) ?? [])]).find((child) => externalNames.has(child))
      if (external !== undefined) {
        console.warn(`[formatgen] No serialization helpers for "${name}": it depends on external type "${external}"`)
        continue
      }

      const typeName = JSON.stringify(name)
      parts.push(
        [
          `export function encode${name}(value: ${name}, encoding: ${encodingType} = ${defaultEncoding}): Uint8Array {`,
          `${space(2)}return encodeValue(registry, ${typeName}, value, encoding)`,
          `}`,
          ``,
          `export function decode${name}(bytes: Uint8Array, encoding: ${encodingType} = ${defaultEncoding}): ${name} {`,
          `${space(2)}return decodeValue(registry, ${typeName}, bytes, encoding) as ${name}`,
          `}`,
        ].join("\n"),
      )
    }

    return parts.join("\n\n")
  }
}
