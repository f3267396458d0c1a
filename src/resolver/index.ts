// ABOUTME: Public API for the resolver module.
// ABOUTME: Re-exports the orchestrator and each resolution stage.

// Orchestration
export { resolve, resolveTree } from "./config-resolver.ts";
export { ResolutionContext } from "./context.ts";

// Stages
export { assertAcyclic, findCycle } from "./cycle-detector.ts";
export { assertDepth, computeDepths } from "./depth-guard.ts";
export { evaluateExpression, renderNode } from "./expression-renderer.ts";
export { parseExpression, scanTemplate } from "./expression-scanner.ts";
export { buildReferenceGraph, collectDependencies } from "./graph-builder.ts";
export { topologicalSort } from "./topological-sort.ts";

// Filters and paths
export { applyFilter, BUILTIN_FILTERS, createFilterRegistry, FilterError, stringifyScalar } from "./filters.ts";
export { cloneValue, formatPath, getAtPath, parsePath, setAtPath, walkTree } from "./paths.ts";

export type { BuildGraphOptions } from "./graph-builder.ts";
export type { ScanOptions } from "./expression-scanner.ts";
export type { PathLookup, PathSegment } from "./paths.ts";

// Types
export type {
  DependencyNode,
  FilterArg,
  FilterCall,
  FilterDefinition,
  FilterRegistry,
  LeafPath,
  ReferenceExpression,
  ReferenceGraph,
  ResolutionReport,
  ResolutionResult,
  ResolverOptions,
} from "./types.ts";
