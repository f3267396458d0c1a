// ABOUTME: Orders dependency nodes so every node comes after the nodes it references.
// ABOUTME: Kahn's algorithm; ties go to the node discovered first in the tree walk.

import type { LeafPath } from "./types.ts";
import { CircularDependencyError } from "../errors.ts";
import { findCycle } from "./cycle-detector.ts";

type Dependencies = ReadonlyMap<LeafPath, readonly LeafPath[]>;

export function topologicalSort(dependencies: Dependencies): LeafPath[] {
  const discovery = new Map<LeafPath, number>();
  const pending = new Map<LeafPath, number>();
  const dependents = new Map<LeafPath, LeafPath[]>();

  for (const [path, deps] of dependencies) {
    discovery.set(path, discovery.size);
    pending.set(path, deps.length);
    for (const dep of deps) {
      dependents.set(dep, [...(dependents.get(dep) ?? []), path]);
    }
  }

  const rank = (path: LeafPath): number => discovery.get(path) ?? Number.POSITIVE_INFINITY;
  const ready = [...pending].filter(([, count]) => count === 0).map(([path]) => path);
  const order: LeafPath[] = [];

  while (ready.length > 0) {
    ready.sort((a, b) => rank(a) - rank(b));
    const next = ready.shift();
    if (next === undefined)
      break;
    order.push(next);

    for (const dependent of dependents.get(next) ?? []) {
      const remaining = (pending.get(dependent) ?? 0) - 1;
      pending.set(dependent, remaining);
      if (remaining === 0) {
        ready.push(dependent);
      }
    }
  }

  if (order.length < dependencies.size) {
    const unsorted = [...dependencies.keys()].filter(path => !order.includes(path));
    throw new CircularDependencyError(findCycle(dependencies) ?? unsorted);
  }
  return order;
}
