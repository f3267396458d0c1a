// ABOUTME: Detects reference cycles with a depth-first search over the dependency map.
// ABOUTME: Every node is tried as a root so cycles unreachable from the first node are found too.

import type { LeafPath } from "./types.ts";
import { CircularDependencyError } from "../errors.ts";

type Dependencies = ReadonlyMap<LeafPath, readonly LeafPath[]>;

// Returns the first cycle found as a closed path (a → b → a), or null
export function findCycle(dependencies: Dependencies): LeafPath[] | null {
  const visited = new Set<LeafPath>();
  const stack: LeafPath[] = [];
  const onStack = new Set<LeafPath>();

  function visit(path: LeafPath): LeafPath[] | null {
    visited.add(path);
    stack.push(path);
    onStack.add(path);

    for (const dependency of dependencies.get(path) ?? []) {
      if (onStack.has(dependency)) {
        return [...stack.slice(stack.indexOf(dependency)), dependency];
      }
      if (!visited.has(dependency)) {
        const cycle = visit(dependency);
        if (cycle)
          return cycle;
      }
    }

    stack.pop();
    onStack.delete(path);
    return null;
  }

  for (const root of dependencies.keys()) {
    if (!visited.has(root)) {
      const cycle = visit(root);
      if (cycle)
        return cycle;
    }
  }
  return null;
}

export function assertAcyclic(dependencies: Dependencies): void {
  const cycle = findCycle(dependencies);
  if (cycle) {
    throw new CircularDependencyError(cycle);
  }
}
