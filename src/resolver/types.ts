// ABOUTME: Shared types for the resolver module.
// ABOUTME: Defines reference expressions, dependency nodes, graphs, options, and reports.

import type { ConfigValue, Delimiters } from "../types.ts";
import type { PathSegment } from "./paths.ts";

// Dotted address of a value in the tree, e.g. "services.api.name" or "hosts.0"
export type LeafPath = string;

export type FilterArg = string | number | boolean | null;

export interface FilterCall {
  name: string;
  args: FilterArg[];
}

// One `{{ values.<path> | filter(...) }}` occurrence inside a string leaf
export interface ReferenceExpression {
  raw: string;
  reference: LeafPath;
  filters: FilterCall[];
  start: number;
  end: number;
  isPure: boolean;
}

export interface DependencyNode {
  path: LeafPath;
  // Location in the tree; `path` is only its display form
  segments: readonly PathSegment[];
  raw: string;
  expressions: ReferenceExpression[];
  // Referenced paths in first-occurrence order, duplicates removed
  references: LeafPath[];
  resolved: boolean;
  value?: ConfigValue;
}

export interface ReferenceGraph {
  // Insertion order is tree-walk discovery order
  nodes: Map<LeafPath, DependencyNode>;
  // Node -> nodes it must wait for (targets, ancestors, and descendants of its references)
  dependencies: Map<LeafPath, LeafPath[]>;
}

export interface FilterDefinition {
  minArgs: number;
  maxArgs: number;
  apply: (value: ConfigValue, args: FilterArg[]) => ConfigValue;
}

export type FilterRegistry = ReadonlyMap<string, FilterDefinition>;

export interface ResolverOptions {
  maxDepth?: number;
  delimiters?: Delimiters;
  // When false the tree is returned untouched
  enabled?: boolean;
  filters?: Record<string, FilterDefinition>;
}

export interface ResolutionReport {
  enabled: boolean;
  edges: Record<LeafPath, LeafPath[]>;
  order: LeafPath[];
  depths: Record<LeafPath, number>;
  passes: number;
}

export interface ResolutionResult {
  tree: ConfigValue;
  report: ResolutionReport;
}
