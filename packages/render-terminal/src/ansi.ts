import type { Style } from "@yamlshade/core";
import { isVisible } from "@yamlshade/core";
import type { ChalkInstance, ColorSupportLevel } from "chalk";
import { Chalk } from "chalk";

export type { ColorSupportLevel };

/** A chalk instance fixed at `level`, or at the detected level. */
export function createChalk(level?: ColorSupportLevel): ChalkInstance {
  return level === undefined ? new Chalk() : new Chalk({ level });
}

/** Applies the style's transform, then its SGR attributes. */
export function paint(style: Style, text: string, chalk: ChalkInstance): string {
  const content = style.apply(text);
  let painter = chalk;
  if (isVisible(style.foreground)) {
    painter = painter.hex(style.foreground.hex);
  }
  if (isVisible(style.background)) {
    painter = painter.bgHex(style.background.hex);
  }
  if (style.bold) {
    painter = painter.bold;
  }
  if (style.italic) {
    painter = painter.italic;
  }
  if (style.underline) {
    painter = painter.underline;
  }
  return painter === chalk ? content : painter(content);
}
