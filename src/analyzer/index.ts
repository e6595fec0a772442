// Dependency analysis
export { getDependencies, getDependencyMap, collectDependencies } from "./dependencies"

// Ordering
export { bestEffortTopologicalSort, compareKeys, type Compare } from "./topological-sort"

// Layout resolution
export {
  Layout,
  resolveLayout,
  resolveDefinitionLayout,
  createLayoutState,
  type DefinitionLayout,
  type LayoutOptions,
  type LayoutState,
  type ReferenceSite,
} from "./layout"

// Compiler pass
export { compileRegistry, type CompiledRegistry, type CompileOptions } from "./compile"
