import { formatHex, interpolate, parse } from "culori";

export interface NoColor {
  readonly type: "none";
}

export interface RgbColor {
  readonly type: "rgb";
  /** Lowercase `#rrggbb`. */
  readonly hex: string;
  /** 0 is fully transparent. */
  readonly alpha: number;
}

export type Color = NoColor | RgbColor;

export const noColor: NoColor = { type: "none" };

const HEX_COLOR_RE = /^#(?:[0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

export function isHexColor(value: string): boolean {
  return HEX_COLOR_RE.test(value);
}

/** Parses `#rgb`, `#rrggbb` or `#rrggbbaa`; anything else is `undefined`. */
export function hexColor(value: string): RgbColor | undefined {
  if (!isHexColor(value)) {
    return undefined;
  }
  const parsed = parse(value);
  if (!parsed) {
    return undefined;
  }
  return {
    type: "rgb",
    hex: formatHex(parsed) ?? value.toLowerCase(),
    alpha: parsed.alpha ?? 1,
  };
}

export function isVisible(color: Color | undefined): color is RgbColor {
  return color !== undefined && color.type === "rgb" && color.alpha > 0;
}

export function sameColor(a: Color, b: Color): boolean {
  if (a.type === "none" || b.type === "none") {
    return a.type === b.type;
  }
  return a.hex === b.hex && a.alpha === b.alpha;
}

const labMidpoint = (a: RgbColor, b: RgbColor): RgbColor => {
  const mixed = interpolate([a.hex, b.hex], "lab")(0.5);
  return { type: "rgb", hex: formatHex(mixed) ?? a.hex, alpha: 1 };
};

/**
 * Even mix of two colors in LAB space. An absent or transparent side yields
 * the other side unchanged; two absent sides yield `undefined`.
 */
export function blendColors(
  base: Color | undefined,
  overlay: Color | undefined
): Color | undefined {
  const baseVisible = isVisible(base);
  const overlayVisible = isVisible(overlay);
  if (baseVisible && overlayVisible) {
    return labMidpoint(base, overlay);
  }
  if (overlayVisible) {
    return overlay;
  }
  if (baseVisible) {
    return base;
  }
  return base ?? overlay;
}

/** The overlay when it is visible, otherwise the base. */
export function overrideColor(
  base: Color | undefined,
  overlay: Color | undefined
): Color | undefined {
  return isVisible(overlay) ? overlay : base;
}
