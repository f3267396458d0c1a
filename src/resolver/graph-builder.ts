// ABOUTME: Builds the reference graph of a configuration tree.
// ABOUTME: Every string leaf holding an expression becomes a node; its references become edges.

import type { ConfigValue, Delimiters } from "../types.ts";
import type { DependencyNode, FilterRegistry, LeafPath, ReferenceGraph } from "./types.ts";
import { AmbiguousPathError } from "../errors.ts";
import { scanTemplate } from "./expression-scanner.ts";
import { isAncestorPath, walkTree } from "./paths.ts";

export interface BuildGraphOptions {
  delimiters?: Delimiters;
  filters?: FilterRegistry;
}

// A reference to `a.b` waits for nodes at `a.b`, above it (a node may resolve to a map)
// and below it (a composite value is only complete once its nodes are)
function touches(reference: LeafPath, nodePath: LeafPath): boolean {
  return reference === nodePath
    || isAncestorPath(nodePath, reference)
    || isAncestorPath(reference, nodePath);
}

export function collectDependencies(
  nodes: ReadonlyMap<LeafPath, DependencyNode>,
): Map<LeafPath, LeafPath[]> {
  const dependencies = new Map<LeafPath, LeafPath[]>();
  for (const node of nodes.values()) {
    const targets = new Set<LeafPath>();
    for (const reference of node.references) {
      for (const candidate of nodes.keys()) {
        if (touches(reference, candidate)) {
          targets.add(candidate);
        }
      }
    }
    dependencies.set(node.path, [...targets]);
  }
  return dependencies;
}

// Referenced paths are not checked for existence here; the renderer reports missing ones
export function buildReferenceGraph(
  tree: ConfigValue,
  options: BuildGraphOptions = {},
): ReferenceGraph {
  const nodes = new Map<LeafPath, DependencyNode>();
  const seen = new Set<LeafPath>();
  const shadowed = new Set<LeafPath>();

  walkTree(tree, (path, value, segments) => {
    if (seen.has(path)) {
      shadowed.add(path);
    }
    seen.add(path);
    if (typeof value !== "string") {
      return;
    }
    const expressions = scanTemplate(value, { ...options, path });
    if (expressions.length === 0) {
      return;
    }
    nodes.set(path, {
      path,
      segments,
      raw: value,
      expressions,
      references: [...new Set(expressions.map(e => e.reference))],
      resolved: false,
    });
  });

  for (const path of shadowed) {
    if (nodes.has(path)) {
      throw new AmbiguousPathError(path);
    }
  }

  return { nodes, dependencies: collectDependencies(nodes) };
}
