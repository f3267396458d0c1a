// ABOUTME: Registry of filters usable in a reference pipeline, e.g. `{{ values.name | lower }}`.
// ABOUTME: Every filter is a pure function from a value and literal arguments to a new value.

import type { ConfigScalar, ConfigValue } from "../types.ts";
import type { FilterArg, FilterDefinition, FilterRegistry } from "./types.ts";
import { isConfigScalar } from "../types.ts";

// Raised by filters; the renderer attaches the node path and expression text
export class FilterError extends Error {
  constructor(filter: string, reason: string) {
    super(`filter '${filter}' ${reason}`);
    this.name = "FilterError";
  }
}

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

// Plain decimal digits, never exponent notation: 1e21 -> "1000000000000000000000"
function toDecimalText(value: number): string {
  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (!match) {
    return text;
  }
  const [, sign = "", lead = "", fraction = "", exponent = "0"] = match;
  const digits = lead + fraction;
  const point = 1 + Number(exponent);
  if (point <= 0) {
    return `${sign}0.${"0".repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${"0".repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

export function stringifyScalar(value: ConfigScalar): string {
  if (value === null) {
    return "null";
  }
  return typeof value === "number" ? toDecimalText(value) : String(value);
}

function describeKind(value: ConfigValue): string {
  if (Array.isArray(value))
    return "list";
  if (value === null)
    return "null";
  return typeof value === "object" ? "map" : typeof value;
}

function asText(filter: string, value: ConfigValue): string {
  if (!isConfigScalar(value)) {
    throw new FilterError(filter, `expects a scalar value, got ${describeKind(value)}`);
  }
  return stringifyScalar(value);
}

function stringArg(filter: string, args: FilterArg[], index: number, fallback?: string): string {
  const arg = args[index];
  if (arg === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof arg !== "string") {
    throw new FilterError(filter, `expects argument ${index + 1} to be a string`);
  }
  return arg;
}

function textFilter(name: string, transform: (text: string) => string): [string, FilterDefinition] {
  return [name, { minArgs: 0, maxArgs: 0, apply: value => transform(asText(name, value)) }];
}

const NUMERIC_TEXT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

export const BUILTIN_FILTERS: FilterRegistry = new Map<string, FilterDefinition>([
  textFilter("lower", text => text.toLowerCase()),
  textFilter("upper", text => text.toUpperCase()),
  textFilter("title", text => text.toLowerCase().replace(/\b[a-z]/g, c => c.toUpperCase())),
  textFilter("capitalize", text => text.charAt(0).toUpperCase() + text.slice(1).toLowerCase()),
  textFilter("trim", text => text.trim()),
  textFilter("string", text => text),
  ["replace", {
    minArgs: 2,
    maxArgs: 2,
    apply: (value, args) =>
      asText("replace", value).replaceAll(stringArg("replace", args, 0), stringArg("replace", args, 1)),
  }],
  ["quote", {
    minArgs: 0,
    maxArgs: 0,
    apply: value => (typeof value === "string" ? `"${value}"` : asText("quote", value)),
  }],
  ["default", {
    minArgs: 1,
    maxArgs: 1,
    apply: (value, args) => (value === null || value === "" ? (args[0] ?? null) : value),
  }],
  ["join", {
    minArgs: 0,
    maxArgs: 1,
    apply: (value, args) => {
      if (!Array.isArray(value)) {
        throw new FilterError("join", `expects a list, got ${describeKind(value)}`);
      }
      return value.map(item => asText("join", item)).join(stringArg("join", args, 0, ""));
    },
  }],
  ["length", {
    minArgs: 0,
    maxArgs: 0,
    apply: (value) => {
      if (typeof value === "string" || Array.isArray(value))
        return value.length;
      if (value !== null && typeof value === "object")
        return Object.keys(value).length;
      throw new FilterError("length", `cannot measure a ${describeKind(value)}`);
    },
  }],
  ["int", {
    minArgs: 0,
    maxArgs: 0,
    apply: (value) => {
      if (typeof value === "number")
        return Math.trunc(value);
      if (typeof value === "boolean")
        return value ? 1 : 0;
      if (typeof value === "string" && NUMERIC_TEXT.test(value.trim()))
        return Math.trunc(Number(value.trim()));
      throw new FilterError("int", `cannot convert ${JSON.stringify(value)} to an integer`);
    },
  }],
]);

// Custom filters override built-ins of the same name
export function createFilterRegistry(custom: Record<string, FilterDefinition> = {}): FilterRegistry {
  return new Map([...BUILTIN_FILTERS, ...Object.entries(custom)]);
}

export function applyFilter(
  registry: FilterRegistry,
  name: string,
  value: ConfigValue,
  args: FilterArg[],
): ConfigValue {
  const filter = registry.get(name);
  if (!filter) {
    throw new FilterError(name, "is not defined");
  }
  if (args.length < filter.minArgs || args.length > filter.maxArgs) {
    const expected = filter.minArgs === filter.maxArgs
      ? `${filter.minArgs}`
      : `${filter.minArgs}-${filter.maxArgs}`;
    throw new FilterError(name, `expects ${expected} argument(s), got ${args.length}`);
  }
  return filter.apply(value, args);
}
