import type {
  Config,
  DiffMode,
  ResolveConfigOptions,
  Span,
} from "@yamlshade/core";
import {
  defaultConfig,
  Finder,
  fullDiff,
  logger,
  Normalizer,
  resolveConfig,
  SegmentOverlapError,
  Source,
  summaryDiff,
  Telemetry,
  TelemetryLive,
} from "@yamlshade/core";
import { yamlClassifier } from "@yamlshade/lexer-yaml";
import { Effect, Layer, Option } from "effect";
import type { ColorSupportLevel } from "./ansi.js";
import type { Gutter } from "./gutter.js";
import { defaultGutter, diffGutter, lineNumberGutter } from "./gutter.js";
import { Printer } from "./printer.js";
import { defaultStyles, lookupTheme } from "./themes.js";

export interface HighlightOptions {
  readonly name?: string;
  /** Inclusive line range to print. */
  readonly lines?: readonly [first: number, last: number];
}

export interface DiffOptions {
  readonly mode?: DiffMode;
  readonly contextLines?: number;
  readonly originName?: string;
  readonly tipName?: string;
}

export interface SearchResult {
  readonly matches: readonly Span[];
  readonly output: string;
}

export interface YamlRendererOptions {
  readonly config?: Config;
  readonly colorLevel?: ColorSupportLevel;
}

const toOverlapError = (error: unknown) =>
  error instanceof SegmentOverlapError
    ? error
    : new SegmentOverlapError({
        line: 0,
        message: error instanceof Error ? error.message : String(error),
      });

const classified = (text: string, name: string | undefined) =>
  Effect.try({
    try: () =>
      Source.fromString(text, name === undefined ? {} : { name }).classify(
        yamlClassifier
      ),
    catch: toOverlapError,
  });

/** Highlighting, diffing and searching of YAML text with telemetry spans. */
export const makeYamlRenderer = (
  options: YamlRendererOptions = {}
) =>
  Effect.gen(function* () {
    const telemetry = yield* Telemetry;
    const config = options.config ?? defaultConfig;
    const styles = Option.getOrElse(lookupTheme(config.theme), () => {
      logger.warn(`Unknown theme "${config.theme}", using the default theme`);
      return defaultStyles();
    });
    const printerFor = (gutter: Gutter | undefined) =>
      new Printer({
        styles,
        controlEscape: config.printer.controlEscape,
        tabWidth: config.printer.tabWidth,
        width: config.printer.width,
        annotations: config.printer.annotations,
        ...(gutter ? { gutter } : {}),
        ...(options.colorLevel === undefined
          ? {}
          : { colorLevel: options.colorLevel }),
      });
    const sourcePrinter = printerFor(
      config.printer.lineNumbers ? lineNumberGutter() : undefined
    );
    const diffPrinter = printerFor(
      config.printer.lineNumbers ? defaultGutter() : diffGutter()
    );
    const normalizer = new Normalizer(config.finder);

    const highlight = (text: string, highlightOptions: HighlightOptions = {}) =>
      telemetry.span(
        "highlight",
        { name: highlightOptions.name },
        Effect.gen(function* () {
          const source = yield* classified(text, highlightOptions.name);
          yield* telemetry.metric("highlight", "lines", source.lineCount);
          const range = highlightOptions.lines;
          return range
            ? sourcePrinter.printSlice(source, range[0], range[1])
            : sourcePrinter.print(source);
        })
      );

    const diff = (origin: string, tip: string, diffOptions: DiffOptions = {}) =>
      telemetry.span(
        "diff",
        { mode: diffOptions.mode ?? "full" },
        Effect.gen(function* () {
          const originSource = yield* classified(origin, diffOptions.originName);
          const tipSource = yield* classified(tip, diffOptions.tipName);
          const view =
            diffOptions.mode === "summary"
              ? summaryDiff(
                  originSource,
                  tipSource,
                  diffOptions.contextLines ?? config.diff.contextLines
                )
              : fullDiff(originSource, tipSource);
          yield* telemetry.metric(
            "diff",
            "changes",
            view.events.filter((event) => event.type !== "equal").length
          );
          return diffPrinter.printDiff(view, {
            hunkHeaders: config.diff.hunkHeaders,
          });
        })
      );

    const search = (text: string, query: string) =>
      telemetry.span(
        "search",
        { queryLength: query.length },
        Effect.gen(function* () {
          const source = yield* classified(text, undefined);
          const matches = new Finder({ normalizer }).load(source).find(query);
          source.addOverlay("generic-highlight", ...matches);
          yield* telemetry.metric("search", "matches", matches.length);
          const result: SearchResult = {
            matches,
            output: sourcePrinter.print(source),
          };
          return result;
        })
      );

    return { highlight, diff, search } as const;
  });

export class YamlRenderer extends Effect.Service<YamlRenderer>()(
  "@yamlshade/YamlRenderer",
  {
    effect: makeYamlRenderer(),
    dependencies: [Telemetry.Default],
  }
) {}

/** A renderer layer for a resolved configuration; needs {@link Telemetry}. */
export const yamlRendererLayer = (options: YamlRendererOptions) =>
  Layer.effect(
    YamlRenderer,
    Effect.map(makeYamlRenderer(options), (service) => new YamlRenderer(service))
  );

/** Renderer and telemetry both configured from `config`. */
export const yamlRendererLive = (config: Config, colorLevel?: ColorSupportLevel) =>
  yamlRendererLayer({
    config,
    ...(colorLevel === undefined ? {} : { colorLevel }),
  }).pipe(Layer.provide(TelemetryLive(config.telemetry)));

/**
 * Resolves the project, user and environment configuration, then builds
 * {@link yamlRendererLive} from it.
 */
export const yamlRendererFromConfig = (
  options: ResolveConfigOptions = {},
  colorLevel?: ColorSupportLevel
) =>
  Layer.unwrapEffect(
    Effect.map(resolveConfig(options), (resolved) =>
      yamlRendererLive(resolved.config, colorLevel)
    )
  );
