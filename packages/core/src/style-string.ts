import { hexColor, isVisible } from "./color.js";
import { StyleStringError } from "./errors.js";
import { Style } from "./style.js";

/**
 * Parses a space-separated style string such as `"bold #c678dd bg:#282c34"`
 * on top of `base`. Recognised words: `bold`, `italic`, `underline` and their
 * `no` forms, hex colors, `bg:` hex colors. `noinherit` and `border:` are
 * accepted and ignored.
 */
export function parseStyle(input: string, base: Style = Style.empty): Style {
  let style = base;
  for (const token of input.trim().split(/\s+/)) {
    if (token.length > 0) {
      style = applyToken(style, token);
    }
  }
  return style;
}

function applyToken(style: Style, token: string): Style {
  const lower = token.toLowerCase();
  if (lower.startsWith("bg:")) {
    const background = hexColor(token.slice(3));
    if (!background) {
      throw invalidColor(token.slice(3));
    }
    return style.with({ background });
  }
  if (lower.startsWith("border:")) {
    return style;
  }
  switch (lower) {
    case "bold":
      return style.with({ bold: true });
    case "nobold":
      return style.with({ bold: false });
    case "italic":
      return style.with({ italic: true });
    case "noitalic":
      return style.with({ italic: false });
    case "underline":
      return style.with({ underline: true });
    case "nounderline":
      return style.with({ underline: false });
    case "noinherit":
      return style;
    default:
      break;
  }
  const foreground = hexColor(token);
  if (!foreground) {
    throw new StyleStringError({
      reason: "unknown-keyword",
      token,
      message: `Unknown style keyword: ${token}`,
    });
  }
  return style.with({ foreground });
}

const invalidColor = (token: string) =>
  new StyleStringError({
    reason: "invalid-color",
    token,
    message: `Invalid color: ${token}`,
  });

/** Inverse of {@link parseStyle}; transforms are not representable. */
export function encodeStyle(style: Style): string {
  const parts: string[] = [];
  if (style.bold) {
    parts.push("bold");
  }
  if (style.italic) {
    parts.push("italic");
  }
  if (style.underline) {
    parts.push("underline");
  }
  if (isVisible(style.foreground)) {
    parts.push(style.foreground.hex);
  }
  if (isVisible(style.background)) {
    parts.push(`bg:${style.background.hex}`);
  }
  return parts.join(" ");
}
