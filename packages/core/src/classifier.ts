import { Span } from "./position.js";
import type { StyleCategory } from "./style-category.js";
import type { Token, TokenKind, Tokenizer } from "./token.js";
import { isKeyCandidate } from "./token.js";

/** A styled piece of exactly one line. */
export interface ClassifiedSegment {
  readonly span: Span;
  readonly category: StyleCategory;
  readonly text: string;
}

export interface Classifier {
  classify(text: string): Iterable<ClassifiedSegment>;
}

const tokenCategories: Record<TokenKind, StyleCategory | undefined> = {
  comment: "comment",
  directive: "comment-preproc",
  "unknown-directive": "generic-error-unknown",
  "document-start": "punctuation-heading",
  "document-end": "punctuation-heading",
  "mapping-key": "name-tag",
  "mapping-value": "punctuation-mapping-value",
  "sequence-entry": "punctuation-sequence-entry",
  "mapping-start": "punctuation-mapping-start",
  "mapping-end": "punctuation-mapping-end",
  "sequence-start": "punctuation-sequence-start",
  "sequence-end": "punctuation-sequence-end",
  "collect-entry": "punctuation-collect-entry",
  "literal-header": "punctuation-block-literal",
  "folded-header": "punctuation-block-folded",
  "block-content": "literal-string",
  anchor: "name-anchor",
  alias: "name-alias",
  tag: "name-decorator",
  "merge-key": "literal-string",
  null: "literal-null",
  bool: "literal-boolean",
  integer: "literal-number-integer",
  binary: "literal-number-bin",
  octal: "literal-number-oct",
  hex: "literal-number-hex",
  float: "literal-number-float",
  infinity: "literal-number-infinity",
  nan: "literal-number-nan",
  string: "literal-string",
  "double-quoted": "literal-string-double",
  "single-quoted": "literal-string-single",
  space: "text",
  newline: undefined,
  invalid: "generic-error-invalid",
};

/**
 * Category for `token`, given the next significant token after it. Key
 * candidates followed by `:` are keys; `<<` followed by `:` is a merge.
 */
export function categoryForToken(
  token: Token,
  next: Token | undefined
): StyleCategory | undefined {
  if (next?.kind === "mapping-value" && isKeyCandidate(token)) {
    return token.kind === "merge-key" ? "name-alias-merge" : "name-tag";
  }
  return tokenCategories[token.kind];
}

function* segmentsForToken(
  token: Token,
  category: StyleCategory | undefined
): Generator<ClassifiedSegment> {
  if (category === undefined) {
    return;
  }
  const pieces = token.raw.split("\n");
  for (const [index, piece] of pieces.entries()) {
    if (piece.length === 0) {
      continue;
    }
    const line = token.position.line + index;
    const column = index === 0 ? token.position.column : 1;
    yield {
      span: Span.of(line, column, line, column + [...piece].length),
      category,
      text: piece,
    };
  }
}

/**
 * Turns a token stream into per-line segments. Key candidates are held back
 * together with the spaces after them until the next significant token shows
 * whether they are mapping keys.
 */
export class TokenClassifier implements Classifier {
  constructor(private readonly tokenize: Tokenizer) {}

  *classify(text: string): Generator<ClassifiedSegment> {
    let pending: Token[] = [];
    const flush = function* (next: Token | undefined) {
      const [head, ...rest] = pending;
      pending = [];
      if (!head) {
        return;
      }
      yield* segmentsForToken(head, categoryForToken(head, next));
      for (const token of rest) {
        yield* segmentsForToken(token, categoryForToken(token, undefined));
      }
    };

    for (const token of this.tokenize(text)) {
      if (pending.length > 0 && token.kind === "space") {
        pending.push(token);
        continue;
      }
      yield* flush(token);
      if (isKeyCandidate(token)) {
        pending = [token];
        continue;
      }
      yield* segmentsForToken(token, categoryForToken(token, undefined));
    }
    yield* flush(undefined);
  }
}
