// ABOUTME: Resolves every reference in a configuration tree.
// ABOUTME: Builds the graph, rejects cycles and deep chains, sorts, then renders nodes in order.

import type { ConfigValue } from "../types.ts";
import type { LeafPath, ResolutionReport, ResolutionResult, ResolverOptions } from "./types.ts";
import { DEFAULT_DELIMITERS, DEFAULT_MAX_DEPTH } from "../types.ts";
import { ResolutionContext } from "./context.ts";
import { assertAcyclic } from "./cycle-detector.ts";
import { assertDepth, computeDepths } from "./depth-guard.ts";
import { renderNode } from "./expression-renderer.ts";
import { createFilterRegistry } from "./filters.ts";
import { buildReferenceGraph } from "./graph-builder.ts";
import { topologicalSort } from "./topological-sort.ts";

function checkOptions(maxDepth: number, delimiters: readonly string[]): void {
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }
  if (delimiters.some(delimiter => delimiter.length === 0)) {
    throw new RangeError("Delimiters must be non-empty strings");
  }
}

// All-or-nothing: any error aborts the run and no partial tree is returned
export function resolve(tree: ConfigValue, options: ResolverOptions = {}): ResolutionResult {
  const {
    maxDepth = DEFAULT_MAX_DEPTH,
    delimiters = DEFAULT_DELIMITERS,
    enabled = true,
  } = options;

  if (!enabled) {
    return {
      tree,
      report: { enabled: false, edges: {}, order: [], depths: {}, passes: 0 },
    };
  }
  checkOptions(maxDepth, delimiters);

  const filters = createFilterRegistry(options.filters);
  const graph = buildReferenceGraph(tree, { delimiters, filters });
  assertAcyclic(graph.dependencies);
  const depths = computeDepths(graph.dependencies);
  assertDepth(depths, maxDepth);
  const order = topologicalSort(graph.dependencies);

  const context = new ResolutionContext(tree);
  for (const path of order) {
    const node = graph.nodes.get(path);
    if (!node)
      continue;
    const value = renderNode(node, context, filters);
    context.commit(path, value, node.segments);
    node.value = value;
    node.resolved = true;
  }

  const edges: Record<LeafPath, LeafPath[]> = Object.fromEntries(
    [...graph.nodes].map(([path, node]) => [path, node.references]),
  );

  const report: ResolutionReport = {
    enabled: true,
    edges,
    order,
    depths: Object.fromEntries(depths),
    passes: 1,
  };
  return { tree: context.snapshot(), report };
}

export function resolveTree(tree: ConfigValue, options: ResolverOptions = {}): ConfigValue {
  return resolve(tree, options).tree;
}
