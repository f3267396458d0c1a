// ABOUTME: Renders the expressions of one dependency node against the resolution context.
// ABOUTME: A pure reference keeps the referenced value's type; interpolation always yields a string.

import type { ConfigValue } from "../types.ts";
import type { ResolutionContext } from "./context.ts";
import type { DependencyNode, FilterRegistry, ReferenceExpression } from "./types.ts";
import {
  NonStringifiableValueError,
  ReferenceNotFoundError,
  TemplateSyntaxError,
} from "../errors.ts";
import { isConfigScalar } from "../types.ts";
import { applyFilter, BUILTIN_FILTERS, FilterError, stringifyScalar } from "./filters.ts";

export function evaluateExpression(
  node: DependencyNode,
  expression: ReferenceExpression,
  context: ResolutionContext,
  filters: FilterRegistry = BUILTIN_FILTERS,
): ConfigValue {
  const lookup = context.lookup(expression.reference);
  if (!lookup.found) {
    throw new ReferenceNotFoundError(node.path, expression.reference);
  }

  let value = lookup.value;
  for (const filter of expression.filters) {
    try {
      value = applyFilter(filters, filter.name, value, filter.args);
    }
    catch (error) {
      if (error instanceof FilterError) {
        throw new TemplateSyntaxError(node.path, expression.raw, error.message);
      }
      throw error;
    }
  }
  return value;
}

export function renderNode(
  node: DependencyNode,
  context: ResolutionContext,
  filters: FilterRegistry = BUILTIN_FILTERS,
): ConfigValue {
  const [first] = node.expressions;
  if (first?.isPure) {
    return evaluateExpression(node, first, context, filters);
  }

  let rendered = "";
  let cursor = 0;
  for (const expression of node.expressions) {
    const value = evaluateExpression(node, expression, context, filters);
    if (!isConfigScalar(value)) {
      const kind = Array.isArray(value) ? "list" : "map";
      throw new NonStringifiableValueError(node.path, expression.reference, kind);
    }
    rendered += node.raw.slice(cursor, expression.start) + stringifyScalar(value);
    cursor = expression.end;
  }
  return rendered + node.raw.slice(cursor);
}
