// ABOUTME: Variable scope used while rendering expressions.
// ABOUTME: Resolved nodes expose their final value; unvisited nodes still hold their raw text.

import type { ConfigValue } from "../types.ts";
import type { LeafPath } from "./types.ts";
import type { PathLookup, PathSegment } from "./paths.ts";
import { cloneValue, getAtPath, parsePath, setAtPath } from "./paths.ts";

export class ResolutionContext {
  private readonly working: ConfigValue;
  private readonly resolved = new Set<LeafPath>();

  constructor(tree: ConfigValue) {
    this.working = cloneValue(tree);
  }

  lookup(path: LeafPath): PathLookup {
    return getAtPath(this.working, path);
  }

  isResolved(path: LeafPath): boolean {
    return this.resolved.has(path);
  }

  // A node is committed once; its value never changes afterwards
  commit(path: LeafPath, value: ConfigValue, segments: readonly PathSegment[] = parsePath(path)): void {
    if (this.resolved.has(path)) {
      throw new Error(`'${path}' has already been resolved`);
    }
    setAtPath(this.working, segments, cloneValue(value));
    this.resolved.add(path);
  }

  get resolvedCount(): number {
    return this.resolved.size;
  }

  snapshot(): ConfigValue {
    return cloneValue(this.working);
  }
}
