// ABOUTME: Error classes raised while loading and resolving configuration documents.
// ABOUTME: Resolver errors share a code and the offending path so reporters can render them.

export const ErrorCodes = {
  TemplateSyntax: "TEMPLATE_SYNTAX",
  CircularDependency: "CIRCULAR_DEPENDENCY",
  ReferenceNotFound: "REFERENCE_NOT_FOUND",
  MaxDepthExceeded: "MAX_DEPTH_EXCEEDED",
  NonStringifiableValue: "NON_STRINGIFIABLE_VALUE",
  AmbiguousPath: "AMBIGUOUS_PATH",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ResolutionErrorJson {
  code: ErrorCode;
  message: string;
  path: string;
  [detail: string]: string | number | string[];
}

export abstract class ResolutionError extends Error {
  abstract readonly code: ErrorCode;
  readonly path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.path = path;
  }

  toJSON(): ResolutionErrorJson {
    return { code: this.code, message: this.message, path: this.path };
  }
}

export class TemplateSyntaxError extends ResolutionError {
  readonly code = ErrorCodes.TemplateSyntax;
  readonly expression: string;
  readonly reason: string;

  constructor(path: string, expression: string, reason: string) {
    super(path, `Invalid template syntax${path ? ` at '${path}'` : ""}: ${reason} (in "${expression}")`);
    this.expression = expression;
    this.reason = reason;
  }

  override toJSON(): ResolutionErrorJson {
    return { ...super.toJSON(), expression: this.expression };
  }
}

export class CircularDependencyError extends ResolutionError {
  readonly code = ErrorCodes.CircularDependency;
  // Closed cycle: the first path is repeated at the end.
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(cycle[0] ?? "", `Circular dependency detected: ${cycle.join(" → ")}`);
    this.cycle = cycle;
  }

  override toJSON(): ResolutionErrorJson {
    return { ...super.toJSON(), cycle: this.cycle };
  }
}

export class ReferenceNotFoundError extends ResolutionError {
  readonly code = ErrorCodes.ReferenceNotFound;
  readonly reference: string;

  constructor(path: string, reference: string) {
    super(path, `Reference 'values.${reference}' not found (referenced from '${path}')`);
    this.reference = reference;
  }

  override toJSON(): ResolutionErrorJson {
    return { ...super.toJSON(), reference: this.reference };
  }
}

export class MaxDepthExceededError extends ResolutionError {
  readonly code = ErrorCodes.MaxDepthExceeded;
  readonly depth: number;
  readonly maxDepth: number;

  constructor(path: string, depth: number, maxDepth: number) {
    super(
      path,
      `Reference chain of '${path}' is ${depth} levels deep, exceeding the maximum of ${maxDepth}`,
    );
    this.depth = depth;
    this.maxDepth = maxDepth;
  }

  override toJSON(): ResolutionErrorJson {
    return { ...super.toJSON(), depth: this.depth, maxDepth: this.maxDepth };
  }
}

export class NonStringifiableValueError extends ResolutionError {
  readonly code = ErrorCodes.NonStringifiableValue;
  readonly reference: string;
  readonly valueKind: "list" | "map";

  constructor(path: string, reference: string, valueKind: "list" | "map") {
    super(
      path,
      `Cannot interpolate ${valueKind} value of 'values.${reference}' into the string at '${path}'`,
    );
    this.reference = reference;
    this.valueKind = valueKind;
  }

  override toJSON(): ResolutionErrorJson {
    return { ...super.toJSON(), reference: this.reference, valueKind: this.valueKind };
  }
}

// Two locations in the tree share one dotted address, e.g. key "a.b" beside a.b
export class AmbiguousPathError extends ResolutionError {
  readonly code = ErrorCodes.AmbiguousPath;

  constructor(path: string) {
    super(path, `Path '${path}' addresses more than one value; a key containing '.' shadows a nested key`);
  }
}

export class ConfigError extends Error {
  readonly file: string | undefined;

  constructor(message: string, file?: string) {
    super(file ? `${message} (in ${file})` : message);
    this.name = "ConfigError";
    this.file = file;
  }
}

export class DocumentLoadError extends Error {
  readonly file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = "DocumentLoadError";
    this.file = file;
  }
}

export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError;
}
