import { Schema } from "effect";
import { NormalizerFoldsSchema } from "./normalizer.js";

export class ConfigValidationError extends Schema.TaggedError<ConfigValidationError>()(
  "ConfigValidationError",
  {
    source: Schema.String,
    message: Schema.String,
  }
) {}

const PrinterConfigSchema = Schema.Struct({
  controlEscape: Schema.Boolean,
  tabWidth: Schema.Number.pipe(Schema.int(), Schema.between(1, 16)),
  annotations: Schema.Boolean,
  lineNumbers: Schema.Boolean,
  width: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
});

const DiffConfigSchema = Schema.Struct({
  contextLines: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
  hunkHeaders: Schema.Boolean,
});

const TelemetryConfigSchema = Schema.Struct({
  enabled: Schema.Boolean,
  exporter: Schema.Literal("console", "otlp-http"),
  endpoint: Schema.optional(Schema.String),
});

export const ConfigSchema = Schema.Struct({
  theme: Schema.String,
  printer: PrinterConfigSchema,
  finder: NormalizerFoldsSchema,
  diff: DiffConfigSchema,
  telemetry: TelemetryConfigSchema,
});

export const ConfigInputSchema = Schema.Struct({
  theme: Schema.optional(Schema.String),
  printer: Schema.optional(Schema.partial(PrinterConfigSchema)),
  finder: Schema.optional(Schema.partial(NormalizerFoldsSchema)),
  diff: Schema.optional(Schema.partial(DiffConfigSchema)),
  telemetry: Schema.optional(Schema.partial(TelemetryConfigSchema)),
});
const ConfigInputJsonSchema = Schema.parseJson(ConfigInputSchema);

export type Config = Schema.Schema.Type<typeof ConfigSchema>;
export type ConfigInput = Schema.Schema.Type<typeof ConfigInputSchema>;
export type PrinterConfig = Schema.Schema.Type<typeof PrinterConfigSchema>;
export type DiffConfig = Schema.Schema.Type<typeof DiffConfigSchema>;
export type TelemetryConfig = Schema.Schema.Type<typeof TelemetryConfigSchema>;

export type ConfigSource = "default" | "project" | "user" | "env";

type SourcesOf<T> = { [K in keyof T]-?: ConfigSource };

export interface ConfigSources {
  theme: ConfigSource;
  printer: SourcesOf<PrinterConfig>;
  finder: SourcesOf<Config["finder"]>;
  diff: SourcesOf<DiffConfig>;
  telemetry: SourcesOf<TelemetryConfig>;
}

export interface ConfigResolution {
  value: Config;
  sources: ConfigSources;
}

type Mutable<T> = { -readonly [K in keyof T]: Mutable<T[K]> };

export const defaultConfig: Config = {
  theme: "midnight",
  printer: {
    controlEscape: true,
    tabWidth: 8,
    annotations: true,
    lineNumbers: false,
    width: 0,
  },
  finder: {
    caseFold: true,
    diacriticFold: true,
    widthFold: false,
  },
  diff: {
    contextLines: 3,
    hunkHeaders: false,
  },
  telemetry: {
    enabled: false,
    exporter: "console",
  },
};

export const defaultSources: ConfigSources = {
  theme: "default",
  printer: {
    controlEscape: "default",
    tabWidth: "default",
    annotations: "default",
    lineNumbers: "default",
    width: "default",
  },
  finder: {
    caseFold: "default",
    diacriticFold: "default",
    widthFold: "default",
  },
  diff: {
    contextLines: "default",
    hunkHeaders: "default",
  },
  telemetry: {
    enabled: "default",
    exporter: "default",
    endpoint: "default",
  },
};

export function decodeConfigInput(source: string, input: unknown): ConfigInput {
  try {
    return Schema.decodeUnknownSync(ConfigInputSchema)(input, {
      onExcessProperty: "error",
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError({ source, message });
  }
}

export function decodeConfigInputJson(
  source: string,
  input: string
): ConfigInput {
  try {
    return Schema.decodeUnknownSync(ConfigInputJsonSchema)(input, {
      onExcessProperty: "error",
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError({ source, message });
  }
}

export function mergeConfig(
  current: ConfigResolution,
  overrides: ConfigInput,
  source: ConfigSource
): ConfigResolution {
  const next: Mutable<ConfigResolution> = {
    value: {
      theme: current.value.theme,
      printer: { ...current.value.printer },
      finder: { ...current.value.finder },
      diff: { ...current.value.diff },
      telemetry: { ...current.value.telemetry },
    },
    sources: {
      theme: current.sources.theme,
      printer: { ...current.sources.printer },
      finder: { ...current.sources.finder },
      diff: { ...current.sources.diff },
      telemetry: { ...current.sources.telemetry },
    },
  };

  const applyPrinter = <K extends keyof PrinterConfig>(
    key: K,
    value: PrinterConfig[K] | undefined
  ) => {
    if (value !== undefined) {
      next.value.printer[key] = value;
      next.sources.printer[key] = source;
    }
  };
  const applyFinder = <K extends keyof Config["finder"]>(
    key: K,
    value: Config["finder"][K] | undefined
  ) => {
    if (value !== undefined) {
      next.value.finder[key] = value;
      next.sources.finder[key] = source;
    }
  };
  const applyDiff = <K extends keyof DiffConfig>(
    key: K,
    value: DiffConfig[K] | undefined
  ) => {
    if (value !== undefined) {
      next.value.diff[key] = value;
      next.sources.diff[key] = source;
    }
  };
  const applyTelemetry = <K extends keyof TelemetryConfig>(
    key: K,
    value: TelemetryConfig[K] | undefined
  ) => {
    if (value !== undefined) {
      next.value.telemetry[key] = value;
      next.sources.telemetry[key] = source;
    }
  };

  if (overrides.theme !== undefined) {
    next.value.theme = overrides.theme;
    next.sources.theme = source;
  }

  if (overrides.printer) {
    applyPrinter("controlEscape", overrides.printer.controlEscape);
    applyPrinter("tabWidth", overrides.printer.tabWidth);
    applyPrinter("annotations", overrides.printer.annotations);
    applyPrinter("lineNumbers", overrides.printer.lineNumbers);
    applyPrinter("width", overrides.printer.width);
  }

  if (overrides.finder) {
    applyFinder("caseFold", overrides.finder.caseFold);
    applyFinder("diacriticFold", overrides.finder.diacriticFold);
    applyFinder("widthFold", overrides.finder.widthFold);
  }

  if (overrides.diff) {
    applyDiff("contextLines", overrides.diff.contextLines);
    applyDiff("hunkHeaders", overrides.diff.hunkHeaders);
  }

  if (overrides.telemetry) {
    applyTelemetry("enabled", overrides.telemetry.enabled);
    applyTelemetry("exporter", overrides.telemetry.exporter);
    applyTelemetry("endpoint", overrides.telemetry.endpoint);
  }

  return next;
}
