import { readFileSync } from "node:fs";
import type { Style, StyleOverrides } from "@yamlshade/core";
import {
  isStyleCategory,
  parseStyle,
  StyleStringError,
  Styles,
  ThemeDecodeError,
} from "@yamlshade/core";
import { Option, Schema } from "effect";

export type ThemeMode = "light" | "dark";

export type ThemeFactory = () => Styles;

interface ThemeEntry {
  readonly name: string;
  readonly mode: ThemeMode;
  readonly factory: ThemeFactory;
}

export const ThemeFileSchema = Schema.Struct({
  name: Schema.String,
  mode: Schema.Literal("light", "dark"),
  base: Schema.String,
  styles: Schema.Record({ key: Schema.String, value: Schema.String }),
});
const ThemeFileJsonSchema = Schema.parseJson(ThemeFileSchema);

export type ThemeFile = Schema.Schema.Type<typeof ThemeFileSchema>;

export const DEFAULT_THEME = "midnight";

// Process-wide and mutable: registering a name again replaces the theme.
const registry = new Map<string, ThemeEntry>();

export function registerTheme(
  name: string,
  factory: ThemeFactory,
  mode: ThemeMode
): void {
  registry.set(name, { name, mode, factory });
}

export function unregisterTheme(name: string): boolean {
  return registry.delete(name);
}

export function lookupTheme(name: string): Option.Option<Styles> {
  const entry = registry.get(name);
  return entry ? Option.some(entry.factory()) : Option.none();
}

/** Registered theme names in registration order, optionally of one mode. */
export function listThemes(mode?: ThemeMode): string[] {
  return [...registry.values()]
    .filter((entry) => mode === undefined || entry.mode === mode)
    .map((entry) => entry.name);
}

/** Builds styles from a decoded theme file; overrides extend the base. */
export function themeStyles(theme: ThemeFile): Styles {
  try {
    const base: Style = parseStyle(theme.base);
    const overrides: StyleOverrides = {};
    for (const [category, spec] of Object.entries(theme.styles)) {
      if (!isStyleCategory(category)) {
        throw new ThemeDecodeError({
          theme: theme.name,
          message: `Unknown style category: ${category}`,
        });
      }
      overrides[category] = parseStyle(spec, base);
    }
    return Styles.make(base, overrides);
  } catch (error) {
    if (error instanceof StyleStringError) {
      throw new ThemeDecodeError({ theme: theme.name, message: error.message });
    }
    throw error;
  }
}

/** Decodes a theme file's JSON text. Throws {@link ThemeDecodeError}. */
export function decodeThemeJson(label: string, json: string): ThemeFile {
  try {
    return Schema.decodeUnknownSync(ThemeFileJsonSchema)(json, {
      onExcessProperty: "error",
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ThemeDecodeError({ theme: label, message });
  }
}

/**
 * Registers the theme stored at `path`. The file is read right away; its
 * styles are built on first lookup and reused afterwards.
 */
export function registerThemeFile(path: string | URL): string {
  const theme = decodeThemeJson(String(path), readFileSync(path, "utf8"));
  let styles: Styles | undefined;
  registerTheme(
    theme.name,
    () => {
      styles ??= themeStyles(theme);
      return styles;
    },
    theme.mode
  );
  return theme.name;
}

for (const file of ["midnight.json", "monokai.json", "github.json"]) {
  registerThemeFile(new URL(`./themes/${file}`, import.meta.url));
}

/** Styles of the bundled default theme. */
export function defaultStyles(): Styles {
  return Option.getOrElse(lookupTheme(DEFAULT_THEME), () => Styles.make());
}
