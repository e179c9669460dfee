/** Lexical classes a tokenizer reports for YAML text. */
export type TokenKind =
  | "comment"
  | "directive"
  | "unknown-directive"
  | "document-start"
  | "document-end"
  | "mapping-key"
  | "mapping-value"
  | "sequence-entry"
  | "mapping-start"
  | "mapping-end"
  | "sequence-start"
  | "sequence-end"
  | "collect-entry"
  | "literal-header"
  | "folded-header"
  | "block-content"
  | "anchor"
  | "alias"
  | "tag"
  | "merge-key"
  | "null"
  | "bool"
  | "integer"
  | "binary"
  | "octal"
  | "hex"
  | "float"
  | "infinity"
  | "nan"
  | "string"
  | "double-quoted"
  | "single-quoted"
  | "space"
  | "newline"
  | "invalid";

export type TokenIndicator =
  | "block-structure"
  | "flow-collection"
  | "block-scalar"
  | "quoted-scalar"
  | "node-property"
  | "directive"
  | "comment"
  | "none";

export interface TokenPosition {
  readonly line: number;
  readonly column: number;
  /** UTF-16 offset into the tokenized text. */
  readonly offset: number;
  /** Leading spaces on the token's line. */
  readonly indentNum: number;
  /** Depth of block nesting at the token. */
  readonly indentLevel: number;
}

export interface Token {
  readonly kind: TokenKind;
  readonly raw: string;
  readonly value: string;
  readonly indicator: TokenIndicator;
  readonly position: TokenPosition;
}

export type Tokenizer = (text: string) => Iterable<Token>;

const SCALAR_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  "merge-key",
  "null",
  "bool",
  "integer",
  "binary",
  "octal",
  "hex",
  "float",
  "infinity",
  "nan",
  "string",
  "double-quoted",
  "single-quoted",
]);

/** Tokens that become a mapping key when a `:` follows them. */
export const isKeyCandidate = (token: Token): boolean =>
  SCALAR_KINDS.has(token.kind);
