/**
 * formatgen/generate
 *
 * Build-time code generation.
 *
 * @example
 * ```ts
 * import { TypeScriptGenerator } from "formatgen/generate"
 * import { parseRegistryJson } from "formatgen"
 *
 * const source = new TypeScriptGenerator({ moduleName: "shapes" }).output(parseRegistryJson(text))
 * ```
 */

export * from "./generate"
