// ABOUTME: Bounds the longest reference chain of an acyclic dependency map.
// ABOUTME: A node referencing only plain values has depth 1; each node above it adds one.

import type { LeafPath } from "./types.ts";
import { MaxDepthExceededError } from "../errors.ts";

type Dependencies = ReadonlyMap<LeafPath, readonly LeafPath[]>;

// Expects an acyclic map; run the cycle detector first
export function computeDepths(dependencies: Dependencies): Map<LeafPath, number> {
  const depths = new Map<LeafPath, number>();

  function depthOf(path: LeafPath): number {
    const known = depths.get(path);
    if (known !== undefined)
      return known;

    let deepest = 0;
    for (const dependency of dependencies.get(path) ?? []) {
      deepest = Math.max(deepest, depthOf(dependency));
    }
    depths.set(path, deepest + 1);
    return deepest + 1;
  }

  for (const path of dependencies.keys()) {
    depthOf(path);
  }
  return depths;
}

export function assertDepth(depths: ReadonlyMap<LeafPath, number>, maxDepth: number): void {
  let worst: [LeafPath, number] | undefined;
  for (const [path, depth] of depths) {
    if (depth > maxDepth && (!worst || depth > worst[1])) {
      worst = [path, depth];
    }
  }
  if (worst) {
    throw new MaxDepthExceededError(worst[0], worst[1], maxDepth);
  }
}
