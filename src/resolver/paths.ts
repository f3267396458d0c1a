// ABOUTME: Dotted path helpers for addressing values inside a configuration tree.
// ABOUTME: Lists are addressed by numeric segments, e.g. "services.0.name".

import type { ConfigValue } from "../types.ts";
import type { LeafPath } from "./types.ts";
import { isConfigMap, setEntry } from "../types.ts";

export type PathSegment = string | number;

export type PathLookup =
  | { found: true; value: ConfigValue }
  | { found: false; value?: undefined };

const MISSING: PathLookup = { found: false };
const INDEX_SEGMENT = /^(?:0|[1-9]\d*)$/;

export function formatPath(segments: readonly PathSegment[]): LeafPath {
  return segments.map(String).join(".");
}

export function parsePath(path: LeafPath): string[] {
  return path === "" ? [] : path.split(".");
}

export function isAncestorPath(ancestor: LeafPath, path: LeafPath): boolean {
  return path.length > ancestor.length && path.startsWith(`${ancestor}.`);
}

function child(container: ConfigValue, segment: PathSegment): PathLookup {
  let value: ConfigValue | undefined;
  if (Array.isArray(container)) {
    value = INDEX_SEGMENT.test(String(segment)) ? container[Number(segment)] : undefined;
  }
  else if (isConfigMap(container) && Object.hasOwn(container, segment)) {
    value = container[String(segment)];
  }
  return value === undefined ? MISSING : { found: true, value };
}

function toSegments(path: LeafPath | readonly PathSegment[]): readonly PathSegment[] {
  return typeof path === "string" ? parsePath(path) : path;
}

// `found` distinguishes a missing path from one holding null.
// Segment arrays address keys that contain dots, or are empty.
export function getAtPath(tree: ConfigValue, path: LeafPath | readonly PathSegment[]): PathLookup {
  let current: PathLookup = { found: true, value: tree };
  for (const segment of toSegments(path)) {
    if (!current.found) {
      break;
    }
    current = child(current.value, segment);
  }
  return current;
}

export function setAtPath(
  tree: ConfigValue,
  path: LeafPath | readonly PathSegment[],
  value: ConfigValue,
): void {
  const segments = toSegments(path);
  const last = segments.at(-1);
  if (last === undefined) {
    throw new Error("Cannot replace the root of a configuration tree");
  }
  const parent = getAtPath(tree, segments.slice(0, -1));
  if (Array.isArray(parent.value) && INDEX_SEGMENT.test(String(last))) {
    parent.value[Number(last)] = value;
  }
  else if (isConfigMap(parent.value)) {
    setEntry(parent.value, String(last), value);
  }
  else {
    throw new Error(`Path '${formatPath(segments)}' does not address a value inside a list or map`);
  }
}

// Visit every value below the root in depth-first, declaration order
export function walkTree(
  tree: ConfigValue,
  visit: (path: LeafPath, value: ConfigValue, segments: readonly PathSegment[]) => void,
  prefix: PathSegment[] = [],
): void {
  const entries: Array<[PathSegment, ConfigValue]> = Array.isArray(tree)
    ? tree.map((item, index): [PathSegment, ConfigValue] => [index, item])
    : isConfigMap(tree)
      ? Object.entries(tree)
      : [];

  for (const [key, value] of entries) {
    const segments = [...prefix, key];
    visit(formatPath(segments), value, segments);
    walkTree(value, visit, segments);
  }
}

export function cloneValue<T extends ConfigValue>(value: T): T {
  return structuredClone(value);
}
