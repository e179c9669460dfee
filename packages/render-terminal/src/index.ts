export type { ColorSupportLevel } from "./ansi.js";
export { createChalk, paint } from "./ansi.js";
export { escapeControl, escapeControls, expandTabs } from "./control-escape.js";
export type { Gutter, GutterContext } from "./gutter.js";
export {
  defaultGutter,
  diffGutter,
  lineNumberGutter,
  noGutter,
} from "./gutter.js";
export type { PrintDiffOptions, PrinterOptions } from "./printer.js";
export { Printer } from "./printer.js";
export type {
  DiffOptions,
  HighlightOptions,
  SearchResult,
  YamlRendererOptions,
} from "./renderer.js";
export {
  makeYamlRenderer,
  YamlRenderer,
  yamlRendererFromConfig,
  yamlRendererLayer,
  yamlRendererLive,
} from "./renderer.js";
export type { ThemeFactory, ThemeFile, ThemeMode } from "./themes.js";
export { wrapRows } from "./wrap.js";
export {
  DEFAULT_THEME,
  decodeThemeJson,
  defaultStyles,
  listThemes,
  lookupTheme,
  registerTheme,
  registerThemeFile,
  themeStyles,
  ThemeFileSchema,
  unregisterTheme,
} from "./themes.js";
