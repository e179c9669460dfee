import type { Token, TokenIndicator, TokenKind } from "@yamlshade/core";
import { TokenClassifier } from "@yamlshade/core";
import { CST, Lexer } from "yaml";
import { isTerminatedQuote, plainScalarKind, unquote } from "./scalar.js";

const zeroWidthLexemes: ReadonlySet<string> = new Set([CST.DOCUMENT]);

const fixedKinds: Partial<Record<CST.TokenType, TokenKind>> = {
  "byte-order-mark": "space",
  "doc-start": "document-start",
  "doc-end": "document-end",
  space: "space",
  newline: "newline",
  comment: "comment",
  "explicit-key-ind": "mapping-key",
  "map-value-ind": "mapping-value",
  "seq-item-ind": "sequence-entry",
  "flow-map-start": "mapping-start",
  "flow-map-end": "mapping-end",
  "flow-seq-start": "sequence-start",
  "flow-seq-end": "sequence-end",
  comma: "collect-entry",
  anchor: "anchor",
  alias: "alias",
  tag: "tag",
};

const indicators: Partial<Record<TokenKind, TokenIndicator>> = {
  comment: "comment",
  directive: "directive",
  "unknown-directive": "directive",
  "document-start": "block-structure",
  "document-end": "block-structure",
  "mapping-key": "block-structure",
  "mapping-value": "block-structure",
  "sequence-entry": "block-structure",
  "mapping-start": "flow-collection",
  "mapping-end": "flow-collection",
  "sequence-start": "flow-collection",
  "sequence-end": "flow-collection",
  "collect-entry": "flow-collection",
  "literal-header": "block-scalar",
  "folded-header": "block-scalar",
  "block-content": "block-scalar",
  "double-quoted": "quoted-scalar",
  "single-quoted": "quoted-scalar",
  anchor: "node-property",
  alias: "node-property",
  tag: "node-property",
};

type ScalarContext = "plain" | "block" | undefined;

const isBlockHeader = (kind: TokenKind | undefined) =>
  kind === "literal-header" || kind === "folded-header";

interface Lexeme {
  readonly kind: TokenKind;
  readonly value: string;
}

/** Describes one lexeme; `scalar` is set when a scalar marker preceded it. */
function describeLexeme(raw: string, scalar: ScalarContext): Lexeme {
  if (scalar === "block") {
    return { kind: "block-content", value: raw };
  }
  if (scalar === "plain") {
    return { kind: plainScalarKind(raw), value: raw };
  }
  const type = CST.tokenType(raw);
  switch (type) {
    case "single-quoted-scalar":
    case "double-quoted-scalar":
      if (!isTerminatedQuote(raw)) {
        return { kind: "invalid", value: raw };
      }
      return {
        kind: type === "single-quoted-scalar" ? "single-quoted" : "double-quoted",
        value: unquote(raw),
      };
    case "block-scalar-header":
      return {
        kind: raw.startsWith("|") ? "literal-header" : "folded-header",
        value: raw,
      };
    case "directive-line":
      return {
        kind: /^%(?:YAML|TAG)\b/.test(raw) ? "directive" : "unknown-directive",
        value: raw,
      };
    case null:
      return { kind: "invalid", value: raw };
    default: {
      const kind = fixedKinds[type];
      return { kind: kind ?? "invalid", value: raw };
    }
  }
}

/**
 * Block nesting tracked from the indentation of each line's first token.
 */
class IndentTracker {
  private readonly stack: number[] = [0];

  level(indent: number): number {
    while (this.stack.length > 1 && (this.stack.at(-1) ?? 0) > indent) {
      this.stack.pop();
    }
    if ((this.stack.at(-1) ?? 0) < indent) {
      this.stack.push(indent);
    }
    return this.stack.length - 1;
  }
}

const isLayout = (kind: TokenKind) =>
  kind === "space" || kind === "newline" || kind === "comment";

const flowClosers: Partial<Record<TokenKind, TokenKind>> = {
  "mapping-start": "mapping-end",
  "sequence-start": "sequence-end",
};

const asInvalid = (token: Token): Token => ({
  ...token,
  kind: "invalid",
  indicator: "none",
});

/**
 * Holds tokens back while a flow collection is open. A collection still open
 * when the flow ends is marked invalid at its opening bracket; a closing
 * bracket with no matching opener is marked invalid where it stands.
 */
class FlowBalancer {
  private pending: Token[] = [];
  private readonly open: number[] = [];

  push(token: Token): readonly Token[] {
    if (flowClosers[token.kind] !== undefined) {
      this.open.push(this.pending.length);
      this.pending.push(token);
      return [];
    }
    let next = token;
    if (token.kind === "mapping-end" || token.kind === "sequence-end") {
      const top = this.open.at(-1);
      const opener = top === undefined ? undefined : this.pending[top];
      if (opener !== undefined && flowClosers[opener.kind] === token.kind) {
        this.open.pop();
      } else {
        next = asInvalid(token);
      }
    }
    if (this.open.length === 0) {
      return this.release([next]);
    }
    this.pending.push(next);
    return [];
  }

  /** Ends every open collection as unclosed. */
  abandon(): readonly Token[] {
    for (const index of this.open.splice(0)) {
      const opener = this.pending[index];
      if (opener !== undefined) {
        this.pending[index] = asInvalid(opener);
      }
    }
    return this.release([]);
  }

  private release(tail: readonly Token[]): readonly Token[] {
    const out = [...this.pending, ...tail];
    this.pending = [];
    return out;
  }
}

/** Tokenizes YAML text with the `yaml` package lexer. Never throws on bad input. */
export function* tokenizeYaml(text: string): Generator<Token> {
  const indents = new IndentTracker();
  let line = 1;
  let column = 1;
  let offset = 0;
  let indentNum = 0;
  let indentLevel = 0;
  let lineStarted = false;
  let scalar: ScalarContext;
  let lastSignificant: TokenKind | undefined;
  const flow = new FlowBalancer();

  for (const raw of new Lexer().lex(text)) {
    if (raw === CST.FLOW_END) {
      yield* flow.abandon();
      continue;
    }
    if (raw === CST.SCALAR) {
      scalar = isBlockHeader(lastSignificant) ? "block" : "plain";
      lastSignificant = undefined;
      continue;
    }
    if (zeroWidthLexemes.has(raw)) {
      continue;
    }
    if (raw.length === 0) {
      continue;
    }
    const { kind, value } = describeLexeme(raw, scalar);
    scalar = undefined;

    if (column === 1) {
      indentNum = kind === "space" ? raw.length : 0;
    }
    if (!lineStarted && kind !== "space" && kind !== "newline") {
      lineStarted = true;
      indentLevel = indents.level(indentNum);
    }

    yield* flow.push({
      kind,
      raw,
      value,
      indicator: indicators[kind] ?? "none",
      position: { line, column, offset, indentNum, indentLevel },
    });

    if (!isLayout(kind)) {
      lastSignificant = kind;
    }
    for (const char of raw) {
      if (char === "\n") {
        line++;
        column = 1;
        lineStarted = false;
      } else {
        column++;
      }
    }
    offset += raw.length;
  }
  yield* flow.abandon();
}

/** Classifier for YAML text. */
export const yamlClassifier = new TokenClassifier(tokenizeYaml);
