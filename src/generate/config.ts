import * as z from "zod"
import { ConfigError } from "../types"

/**
 * Options of a code generator run
 */
export const CodeGeneratorConfigSchema = z
  .object({
    /** Name of the generated module, used in its header */
    moduleName: z.string().min(1),
    /** Whether to embed the registry and emit encode/decode helpers */
    serialization: z.boolean().default(true),
    /** Encodings accepted by the emitted helpers; the first one is the default */
    encodings: z.array(z.enum(["bcs", "bincode"])).min(1).default(["bcs", "bincode"]),
    /** Type names provided by other modules, keyed by import specifier */
    externalDefinitions: z.record(z.string().min(1), z.array(z.string().min(1))).default({}),
    /** Doc comments keyed by `Type`, `Type.field` or `Enum.Variant` */
    comments: z.record(z.string().min(1), z.string()).default({}),
    /** Import specifier of the runtime used by the emitted helpers */
    runtimeModule: z.string().min(1).default("formatgen/runtime"),
  })
  .superRefine((config, ctx) => {
    if (new Set(config.encodings).size !== config.encodings.length) {
      ctx.addIssue({ code: "custom", path: ["encodings"], message: "Encodings must be unique" })
    }

    const owners = new Map<string, string>()
    for (const [module, names] of Object.entries(config.externalDefinitions)) {
      for (const name of names) {
        const owner = owners.get(name)
        if (owner !== undefined) {
          ctx.addIssue({ code: "custom", path: ["externalDefinitions", module], message: `"${name}" is already provided by "${owner}"` })
        }
        owners.set(name, module)
      }
    }
  })

export type CodeGeneratorConfig = z.output<typeof CodeGeneratorConfigSchema>

export type CodeGeneratorConfigInput = z.input<typeof CodeGeneratorConfigSchema>

/**
 * Validate a generator configuration and fill in defaults
 * @throws ConfigError listing every problem found
 */
export function createConfig(input: CodeGeneratorConfigInput): CodeGeneratorConfig {
  const result = CodeGeneratorConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigError({ message: z.prettifyError(result.error), cause: result.error })
  }
  return result.data
}
