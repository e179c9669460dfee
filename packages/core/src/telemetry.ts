import { Effect, Exit, Layer, Schema } from "effect";
import { logger } from "./logger.js";

/** The renderer entry points that report timings and counts. */
export type RenderOperation = "highlight" | "diff" | "search";

/** What a metric counts: printed lines, changed lines or search hits. */
export type RenderMeasure = "lines" | "changes" | "matches";

export type TelemetryAttributes = Readonly<
  Record<string, string | number | boolean | undefined>
>;

export interface TelemetryService {
  /** Times `effect` as one run of `operation`. */
  span: <A, E, R>(
    operation: RenderOperation,
    attributes: TelemetryAttributes,
    effect: Effect.Effect<A, E, R>
  ) => Effect.Effect<A, E, R>;
  metric: (
    operation: RenderOperation,
    measure: RenderMeasure,
    value: number
  ) => Effect.Effect<void, never>;
}

const TelemetryNoop: TelemetryService = {
  span: (_operation, _attributes, effect) => effect,
  metric: () => Effect.void,
};

export class Telemetry extends Effect.Service<Telemetry>()(
  "@yamlshade/Telemetry",
  {
    sync: () => TelemetryNoop,
  }
) {}

export interface TelemetryOptions {
  enabled: boolean;
  exporter: "console" | "otlp-http";
  endpoint?: string;
}

export type TelemetryRecord =
  | {
      readonly kind: "span";
      readonly operation: RenderOperation;
      readonly attributes: TelemetryAttributes;
      readonly status: "ok" | "error";
      readonly startMs: number;
      readonly endMs: number;
    }
  | {
      readonly kind: "metric";
      readonly operation: RenderOperation;
      readonly measure: RenderMeasure;
      readonly value: number;
      readonly timeMs: number;
    };

export const spanName = (operation: RenderOperation) => `yamlshade.${operation}`;

export const metricName = (
  operation: RenderOperation,
  measure: RenderMeasure
) => `yamlshade.${operation}.${measure}`;

/** The JSON line the console exporter prints for `record`. */
export function consoleLine(record: TelemetryRecord) {
  switch (record.kind) {
    case "span":
      return {
        span: spanName(record.operation),
        status: record.status,
        durationMs: record.endMs - record.startMs,
        attributes: record.attributes,
      };
    case "metric":
      return {
        metric: metricName(record.operation, record.measure),
        value: record.value,
      };
  }
}

type OtlpValue =
  | { stringValue: string }
  | { boolValue: boolean }
  | { intValue: string }
  | { doubleValue: number };

const otlpValue = (value: string | number | boolean): OtlpValue => {
  if (typeof value === "string") {
    return { stringValue: value };
  }
  if (typeof value === "boolean") {
    return { boolValue: value };
  }
  return Number.isInteger(value)
    ? { intValue: String(value) }
    : { doubleValue: value };
};

const otlpAttributes = (attributes: TelemetryAttributes) =>
  Object.entries(attributes).flatMap(([key, value]) =>
    value === undefined ? [] : [{ key, value: otlpValue(value) }]
  );

const nanos = (ms: number) => String(ms * 1_000_000);

const resource = {
  attributes: [{ key: "service.name", value: { stringValue: "yamlshade" } }],
};
const scope = { name: "yamlshade" };

export type OtlpSignal = "traces" | "metrics";

/** The OTLP/HTTP JSON body for `record` and the signal path it goes to. */
export function otlpRequest(record: TelemetryRecord): {
  signal: OtlpSignal;
  payload: unknown;
} {
  switch (record.kind) {
    case "span":
      return {
        signal: "traces",
        payload: {
          resourceSpans: [
            {
              resource,
              scopeSpans: [
                {
                  scope,
                  spans: [
                    {
                      name: spanName(record.operation),
                      startTimeUnixNano: nanos(record.startMs),
                      endTimeUnixNano: nanos(record.endMs),
                      status: { code: record.status === "ok" ? 1 : 2 },
                      attributes: [
                        {
                          key: "yamlshade.operation",
                          value: { stringValue: record.operation },
                        },
                        ...otlpAttributes(record.attributes),
                      ],
                    },
                  ],
                },
              ],
            },
          ],
        },
      };
    case "metric":
      return {
        signal: "metrics",
        payload: {
          resourceMetrics: [
            {
              resource,
              scopeMetrics: [
                {
                  scope,
                  metrics: [
                    {
                      name: metricName(record.operation, record.measure),
                      gauge: {
                        dataPoints: [
                          {
                            timeUnixNano: nanos(record.timeMs),
                            asInt: String(Math.round(record.value)),
                          },
                        ],
                      },
                    },
                  ],
                },
              ],
            },
          ],
        },
      };
  }
}

/**
 * The URL for `signal` under a collector `base`. A base that already names
 * the traces path has that path swapped.
 */
export function signalEndpoint(base: string, signal: OtlpSignal) {
  if (base.includes("/v1/traces")) {
    return base.replace("/v1/traces", `/v1/${signal}`);
  }
  return `${base.replace(/\/+$/u, "")}/v1/${signal}`;
}

const encodeJson = (value: unknown) =>
  Schema.encode(Schema.parseJson(Schema.Unknown))(value).pipe(Effect.orDie);

type Exporter = (record: TelemetryRecord) => Effect.Effect<void, never>;

const consoleExporter: Exporter = (record) =>
  encodeJson(consoleLine(record)).pipe(
    Effect.map((json) => {
      console.log(json);
    })
  );

const otlpExporter =
  (endpoint: string): Exporter =>
  (record) => {
    const { signal, payload } = otlpRequest(record);
    return encodeJson(payload).pipe(
      Effect.flatMap((body) =>
        Effect.tryPromise((abort) =>
          fetch(signalEndpoint(endpoint, signal), {
            method: "POST",
            headers: { "content-type": "application/json" },
            body,
            signal: abort,
          })
        )
      ),
      Effect.ignore
    );
  };

const recording = (exporter: Exporter): TelemetryService => ({
  span: <A, E, R>(
    operation: RenderOperation,
    attributes: TelemetryAttributes,
    effect: Effect.Effect<A, E, R>
  ) =>
    Effect.suspend(() => {
      const startMs = Date.now();
      return effect.pipe(
        Effect.onExit((exit: Exit.Exit<A, E>) =>
          exporter({
            kind: "span",
            operation,
            attributes,
            status: Exit.isFailure(exit) ? "error" : "ok",
            startMs,
            endMs: Date.now(),
          })
        )
      );
    }),
  metric: (operation, measure, value) =>
    Effect.suspend(() =>
      exporter({ kind: "metric", operation, measure, value, timeMs: Date.now() })
    ),
});

/**
 * Telemetry that prints JSON lines to stdout (`console`) or posts OTLP/HTTP
 * JSON to `endpoint`. Export failures are dropped. OTLP export without an
 * endpoint logs one warning and records nothing.
 */
export function TelemetryLive(options: TelemetryOptions) {
  return Layer.sync(Telemetry, () => {
    if (!options.enabled) {
      return new Telemetry(TelemetryNoop);
    }
    if (options.exporter === "console") {
      return new Telemetry(recording(consoleExporter));
    }
    if (options.endpoint === undefined || options.endpoint === "") {
      logger.warn(
        "Telemetry exporter enabled without endpoint; skipping OTLP export."
      );
      return new Telemetry(TelemetryNoop);
    }
    return new Telemetry(recording(otlpExporter(options.endpoint)));
  });
}
