import type { TokenKind } from "@yamlshade/core";

const plainScalarPatterns: ReadonlyArray<readonly [TokenKind, RegExp]> = [
  ["null", /^(?:~|null|Null|NULL)$/],
  ["bool", /^(?:true|True|TRUE|false|False|FALSE)$/],
  ["binary", /^[-+]?0b[01_]+$/],
  ["octal", /^[-+]?0o[0-7_]+$/],
  ["hex", /^[-+]?0x[0-9a-fA-F_]+$/],
  ["integer", /^[-+]?[0-9][0-9_]*$/],
  ["infinity", /^[-+]?\.(?:inf|Inf|INF)$/],
  ["nan", /^\.(?:nan|NaN|NAN)$/],
  [
    "float",
    /^[-+]?(?:\.[0-9][0-9_]*|[0-9][0-9_]*(?:\.[0-9_]*)?)(?:[eE][-+]?[0-9]+)?$/,
  ],
];

// "@" and "`" are reserved and may not start a plain scalar.
const reservedIndicator = /^[@`]/;

/** Resolves an unquoted scalar to the kind its text implies. */
export function plainScalarKind(raw: string): TokenKind {
  if (reservedIndicator.test(raw)) {
    return "invalid";
  }
  if (raw === "<<") {
    return "merge-key";
  }
  if (raw.includes("\n")) {
    return "string";
  }
  for (const [kind, pattern] of plainScalarPatterns) {
    if (pattern.test(raw)) {
      return kind;
    }
  }
  return "string";
}

const trailingBackslashes = (text: string) => {
  let count = 0;
  for (let index = text.length - 1; index >= 0 && text[index] === "\\"; index--) {
    count++;
  }
  return count;
};

/** Whether a quoted scalar lexeme has its closing quote. */
export function isTerminatedQuote(raw: string): boolean {
  if (raw.length < 2) {
    return false;
  }
  const body = raw.slice(1);
  if (raw.startsWith("'")) {
    return body.replaceAll("''", "").endsWith("'");
  }
  return body.endsWith('"') && trailingBackslashes(body.slice(0, -1)) % 2 === 0;
}

export function unquote(raw: string): string {
  if (raw.startsWith("'")) {
    return raw.slice(1, -1).replaceAll("''", "'");
  }
  return raw.slice(1, -1);
}
