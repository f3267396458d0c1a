// ABOUTME: Tests for cycle-detector.ts
// ABOUTME: Verifies cycle reconstruction and detection from every root.

import { describe, expect, test } from "vitest";
import { CircularDependencyError } from "../../src/errors.ts";
import { assertAcyclic, findCycle } from "../../src/resolver/cycle-detector.ts";

function deps(entries: Record<string, string[]>): Map<string, string[]> {
  return new Map(Object.entries(entries));
}

describe("findCycle", () => {
  test("returns null for an acyclic map", () => {
    expect(findCycle(deps({ a: [], b: ["a"], c: ["a", "b"] }))).toBeNull();
  });

  test("reports a two-node cycle as a closed path", () => {
    expect(findCycle(deps({ a: ["b"], b: ["a"] }))).toEqual(["a", "b", "a"]);
  });

  test("reports a self reference", () => {
    expect(findCycle(deps({ "app.name": ["app.name"] }))).toEqual(["app.name", "app.name"]);
  });

  test("reports only the looping part of the path", () => {
    expect(findCycle(deps({ a: ["b"], b: ["c"], c: ["d"], d: ["b"] }))).toEqual(["b", "c", "d", "b"]);
  });

  test("finds cycles unreachable from the first node", () => {
    expect(findCycle(deps({ a: [], b: ["a"], x: ["y"], y: ["z"], z: ["x"] }))).toEqual(["x", "y", "z", "x"]);
  });

  test("does not mistake a diamond for a cycle", () => {
    expect(findCycle(deps({ a: [], b: ["a"], c: ["a"], d: ["b", "c"] }))).toBeNull();
  });
});

describe("assertAcyclic", () => {
  test("throws CircularDependencyError carrying the cycle", () => {
    try {
      assertAcyclic(deps({ a: ["b"], b: ["c"], c: ["a"] }));
      expect.unreachable();
    }
    catch (error) {
      expect(error).toBeInstanceOf(CircularDependencyError);
      if (error instanceof CircularDependencyError) {
        expect(error.cycle).toEqual(["a", "b", "c", "a"]);
        expect(error.message).toBe("Circular dependency detected: a → b → c → a");
      }
    }
  });

  test("passes for an empty map", () => {
    expect(() => assertAcyclic(new Map())).not.toThrow();
  });
});
