import { blendColors, overrideColor } from "./color.js";
import type { TextTransform } from "./style.js";
import { Style } from "./style.js";
import type { Styles } from "./styles.js";

type CompositionCache = WeakMap<Style, WeakMap<Style, Style>>;

const composeTransforms = (
  base: TextTransform | undefined,
  overlay: TextTransform | undefined
): TextTransform | undefined => {
  if (base && overlay) {
    return (text) => overlay(base(text));
  }
  return overlay ?? base;
};

const composers = new WeakMap<Styles, StyleComposer>();

/**
 * Combines styles for overlays. Results are memoised per `(base, overlay,
 * mode)`, so asking twice for the same pair returns the same object.
 */
export class StyleComposer {
  private readonly blended: CompositionCache = new WeakMap();
  private readonly overridden: CompositionCache = new WeakMap();

  /** The composer shared by every caller working with `styles`. */
  static for(styles: Styles): StyleComposer {
    const existing = composers.get(styles);
    if (existing) {
      return existing;
    }
    const composer = new StyleComposer();
    composers.set(styles, composer);
    return composer;
  }

  /** Mixes visible colors in LAB space and unions the flags. */
  blend(base: Style, overlay: Style | undefined): Style;
  blend(base: Style | undefined, overlay: Style): Style;
  blend(base: Style | undefined, overlay: Style | undefined): Style | undefined;
  blend(base: Style | undefined, overlay: Style | undefined): Style | undefined {
    return this.compose(base, overlay, false);
  }

  /** Like {@link blend}, but a visible overlay color replaces the base. */
  override(base: Style, overlay: Style | undefined): Style;
  override(base: Style | undefined, overlay: Style): Style;
  override(
    base: Style | undefined,
    overlay: Style | undefined
  ): Style | undefined;
  override(
    base: Style | undefined,
    overlay: Style | undefined
  ): Style | undefined {
    return this.compose(base, overlay, true);
  }

  private compose(
    base: Style | undefined,
    overlay: Style | undefined,
    replace: boolean
  ): Style | undefined {
    if (!base) {
      return overlay;
    }
    if (!overlay || overlay.isEmpty) {
      return base;
    }
    const cache = replace ? this.overridden : this.blended;
    let byOverlay = cache.get(base);
    if (!byOverlay) {
      byOverlay = new WeakMap();
      cache.set(base, byOverlay);
    }
    const cached = byOverlay.get(overlay);
    if (cached) {
      return cached;
    }
    const mix = replace ? overrideColor : blendColors;
    const composed = new Style({
      foreground: mix(base.foreground, overlay.foreground),
      background: mix(base.background, overlay.background),
      bold: base.bold || overlay.bold,
      italic: base.italic || overlay.italic,
      underline: base.underline || overlay.underline,
      transform: composeTransforms(base.transform, overlay.transform),
    });
    byOverlay.set(overlay, composed);
    return composed;
  }
}
