import { Style } from "./style.js";
import type { StyleCategory } from "./style-category.js";
import { categoryLineage, styleCategories } from "./style-category.js";

export type StyleOverrides = Partial<Record<StyleCategory, Style>>;

/**
 * Category to {@link Style} map built from a base style plus overrides.
 * Inheritance is resolved once at construction, so `style` is a lookup.
 */
export class Styles {
  private readonly resolved: ReadonlyMap<StyleCategory, Style>;

  private constructor(
    readonly base: Style,
    private readonly overrides: StyleOverrides
  ) {
    const resolved = new Map<StyleCategory, Style>();
    for (const category of styleCategories) {
      resolved.set(category, resolveCategory(category, base, overrides));
    }
    this.resolved = resolved;
  }

  static make(base: Style = Style.empty, overrides: StyleOverrides = {}): Styles {
    return new Styles(base, { ...overrides });
  }

  style(category: StyleCategory): Style {
    return this.resolved.get(category) ?? this.base;
  }

  /** The style set for exactly this category, ignoring inheritance. */
  override(category: StyleCategory): Style | undefined {
    return this.overrides[category];
  }

  /** A new map with extra overrides; this one is left untouched. */
  with(overrides: StyleOverrides): Styles {
    return new Styles(this.base, { ...this.overrides, ...overrides });
  }
}

function resolveCategory(
  category: StyleCategory,
  base: Style,
  overrides: StyleOverrides
): Style {
  for (const candidate of categoryLineage(category)) {
    const style = overrides[candidate];
    if (style) {
      return style;
    }
  }
  return base;
}
