export { TypeScriptGenerator } from "./typescript"
export { createConfig, CodeGeneratorConfigSchema, type CodeGeneratorConfig, type CodeGeneratorConfigInput } from "./config"
