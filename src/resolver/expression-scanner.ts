// ABOUTME: Lexical scanner for reference expressions embedded in string values.
// ABOUTME: Finds `{{ values.<path> | filter(args) }}` spans and parses their path and filter pipeline.

import type { Delimiters } from "../types.ts";
import type { FilterArg, FilterCall, FilterRegistry, LeafPath, ReferenceExpression } from "./types.ts";
import { TemplateSyntaxError } from "../errors.ts";
import { DEFAULT_DELIMITERS } from "../types.ts";
import { BUILTIN_FILTERS } from "./filters.ts";

export interface ScanOptions {
  delimiters?: Delimiters;
  filters?: FilterRegistry;
  // Path of the leaf being scanned, used to tag errors
  path?: LeafPath;
}

const NAMESPACE = "values";
const SEGMENT = /[\w-]/;
const IDENTIFIER_START = /[A-Z_]/i;
const IDENTIFIER = /\w/;
const NUMBER = /^-?\d+(?:\.\d+)?(?:e[+-]?\d+)?/i;
const KEYWORDS: Record<string, FilterArg> = {
  true: true,
  True: true,
  false: false,
  False: false,
  null: null,
  none: null,
  None: null,
};
const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r" };

interface ParsedExpression {
  reference: LeafPath;
  filters: FilterCall[];
}

// Cursor over the text between the delimiters of one expression
class ExpressionParser {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly fail: (reason: string) => never,
    private readonly registry: FilterRegistry,
  ) {}

  parse(): ParsedExpression {
    this.skipWhitespace();
    const namespace = this.readWhile(IDENTIFIER);
    if (namespace !== NAMESPACE || this.peek() !== ".") {
      this.fail(`expression must start with '${NAMESPACE}.<path>'`);
    }
    this.pos++;
    const reference = this.readPath();

    const filters: FilterCall[] = [];
    this.skipWhitespace();
    while (!this.atEnd()) {
      if (this.peek() !== "|") {
        this.fail(`unexpected '${this.source.slice(this.pos).trim()}' after '${NAMESPACE}.${reference}'`);
      }
      this.pos++;
      filters.push(this.readFilter());
      this.skipWhitespace();
    }

    return { reference, filters };
  }

  private readPath(): LeafPath {
    const segments: string[] = [];
    for (;;) {
      const segment = this.readWhile(SEGMENT);
      if (segment === "") {
        this.fail("expected a path segment");
      }
      segments.push(segment);
      if (this.peek() !== ".") {
        return segments.join(".");
      }
      this.pos++;
    }
  }

  private readFilter(): FilterCall {
    this.skipWhitespace();
    if (!IDENTIFIER_START.test(this.peek())) {
      this.fail("expected a filter name after '|'");
    }
    const name = this.readWhile(IDENTIFIER);
    const filter = this.registry.get(name);
    if (!filter) {
      return this.fail(`unknown filter '${name}'`);
    }

    this.skipWhitespace();
    const args = this.peek() === "(" ? this.readArgs() : [];
    if (args.length < filter.minArgs || args.length > filter.maxArgs) {
      const expected = filter.minArgs === filter.maxArgs
        ? `${filter.minArgs}`
        : `${filter.minArgs}-${filter.maxArgs}`;
      return this.fail(`filter '${name}' expects ${expected} argument(s), got ${args.length}`);
    }
    return { name, args };
  }

  private readArgs(): FilterArg[] {
    const args: FilterArg[] = [];
    this.pos++; // (
    this.skipWhitespace();
    if (this.peek() === ")") {
      this.pos++;
      return args;
    }
    for (;;) {
      this.skipWhitespace();
      args.push(this.readLiteral());
      this.skipWhitespace();
      const next = this.peek();
      this.pos++;
      if (next === ")")
        return args;
      if (next !== ",")
        this.fail(next === "" ? "unclosed filter argument list" : `unexpected '${next}' in filter arguments`);
    }
  }

  private readLiteral(): FilterArg {
    const quote = this.peek();
    if (quote === "\"" || quote === "'") {
      return this.readString(quote);
    }

    const number = NUMBER.exec(this.source.slice(this.pos));
    if (number) {
      this.pos += number[0].length;
      return Number(number[0]);
    }

    const word = this.readWhile(IDENTIFIER);
    if (Object.hasOwn(KEYWORDS, word)) {
      return KEYWORDS[word] ?? null;
    }
    return this.fail(word === "" ? "expected a filter argument" : `invalid filter argument '${word}'`);
  }

  private readString(quote: string): string {
    let text = "";
    this.pos++;
    while (!this.atEnd()) {
      const char = this.peek();
      this.pos++;
      if (char === quote) {
        return text;
      }
      if (char === "\\" && !this.atEnd()) {
        const escaped = this.peek();
        this.pos++;
        text += ESCAPES[escaped] ?? escaped;
      }
      else {
        text += char;
      }
    }
    return this.fail("unterminated string literal");
  }

  private readWhile(pattern: RegExp): string {
    const start = this.pos;
    while (!this.atEnd() && pattern.test(this.peek())) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  private skipWhitespace(): void {
    this.readWhile(/\s/);
  }

  private peek(): string {
    return this.source.charAt(this.pos);
  }

  private atEnd(): boolean {
    return this.pos >= this.source.length;
  }
}

export function parseExpression(
  inner: string,
  raw: string,
  options: ScanOptions = {},
): ParsedExpression {
  const { filters = BUILTIN_FILTERS, path = "" } = options;
  const fail = (reason: string): never => {
    throw new TemplateSyntaxError(path, raw, reason);
  };
  return new ExpressionParser(inner, fail, filters).parse();
}

// Index of `needle` at or after `from`, ignoring quoted filter arguments; -1 if absent
// or if a quote is left open
function indexOutsideQuotes(text: string, needle: string, from: number): number {
  let quote: string | undefined;
  for (let i = from; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote) {
      if (ch === "\\") {
        i++;
      }
      else if (ch === quote) {
        quote = undefined;
      }
    }
    else if (ch === "\"" || ch === "'") {
      quote = ch;
    }
    else if (text.startsWith(needle, i)) {
      return i;
    }
  }
  return -1;
}

// Find every reference expression in a string value, in order of appearance
export function scanTemplate(text: string, options: ScanOptions = {}): ReferenceExpression[] {
  const [open, close] = options.delimiters ?? DEFAULT_DELIMITERS;
  const path = options.path ?? "";
  const found: Array<Omit<ReferenceExpression, "isPure">> = [];

  let pos = 0;
  for (;;) {
    const start = text.indexOf(open, pos);
    const strayClose = text.indexOf(close, pos);
    if (strayClose !== -1 && (start === -1 || strayClose < start)) {
      throw new TemplateSyntaxError(path, text, `unmatched '${close}' at offset ${strayClose}`);
    }
    if (start === -1) {
      break;
    }

    const innerStart = start + open.length;
    let closeAt = indexOutsideQuotes(text, close, innerStart);
    if (closeAt === -1) {
      // An open quote swallowed the delimiter; the parser reports it
      closeAt = text.indexOf(close, innerStart);
    }
    if (closeAt === -1) {
      throw new TemplateSyntaxError(path, text.slice(start), `unterminated '${open}' at offset ${start}`);
    }
    const inner = text.slice(innerStart, closeAt);
    const end = closeAt + close.length;
    const raw = text.slice(start, end);
    if (indexOutsideQuotes(inner, open, 0) !== -1) {
      throw new TemplateSyntaxError(path, raw, `nested '${open}' inside an expression`);
    }

    found.push({ raw, start, end, ...parseExpression(inner, raw, options) });
    pos = end;
  }

  const [only] = found;
  const isPure = found.length === 1 && only !== undefined && text.trim() === only.raw;
  return found.map(expression => ({ ...expression, isPure }));
}
