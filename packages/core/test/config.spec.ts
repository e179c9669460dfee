import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, Either } from "effect";
import { afterEach, describe, expect, test } from "vitest";
import type { ConfigResolution } from "../src/config.js";
import {
  ConfigValidationError,
  decodeConfigInput,
  decodeConfigInputJson,
  defaultConfig,
  defaultSources,
  mergeConfig,
} from "../src/config.js";
import { readEnvConfig, resolveConfig } from "../src/config-resolve.js";

function expectValidationFailure(
  callback: () => unknown
): ConfigValidationError {
  try {
    callback();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected ConfigValidationError");
}

describe("config decoding", () => {
  test("decodeConfigInput reports validation failures", () => {
    const error = expectValidationFailure(() =>
      decodeConfigInput("env", {
        telemetry: { exporter: "zipkin" },
      })
    );
    expect(error.source).toBe("env");
    expect(error.message).toContain("exporter");
  });

  test("decodeConfigInputJson rejects unknown fields", () => {
    const error = expectValidationFailure(() =>
      decodeConfigInputJson(
        "project",
        JSON.stringify({
          printer: { wrap: true },
        })
      )
    );
    expect(error.source).toBe("project");
    expect(error.message).toContain("wrap");
  });

  test("tab width must be a small positive integer", () => {
    const error = expectValidationFailure(() =>
      decodeConfigInput("user", { printer: { tabWidth: 0 } })
    );
    expect(error.source).toBe("user");
  });
});

describe("mergeConfig", () => {
  test("tracks sources per field across layered overrides", () => {
    const initial: ConfigResolution = {
      value: defaultConfig,
      sources: defaultSources,
    };

    const withProject = mergeConfig(
      initial,
      decodeConfigInput("project", {
        theme: "monokai",
        printer: { lineNumbers: true },
        diff: { contextLines: 1 },
        telemetry: {
          enabled: true,
          endpoint: "https://collector.example.com",
        },
      }),
      "project"
    );

    const merged = mergeConfig(
      withProject,
      decodeConfigInput("env", {
        finder: { widthFold: true },
        diff: { contextLines: 5 },
      }),
      "env"
    );

    expect(merged.sources.theme).toBe("project");
    expect(merged.sources.printer.lineNumbers).toBe("project");
    expect(merged.sources.printer.tabWidth).toBe("default");
    expect(merged.sources.finder.widthFold).toBe("env");
    expect(merged.sources.finder.caseFold).toBe("default");
    expect(merged.sources.diff.contextLines).toBe("env");
    expect(merged.sources.telemetry.enabled).toBe("project");
    expect(merged.sources.telemetry.exporter).toBe("default");

    expect(merged.value.theme).toBe("monokai");
    expect(merged.value.diff.contextLines).toBe(5);
    expect(merged.value.finder).toEqual({
      caseFold: true,
      diacriticFold: true,
      widthFold: true,
    });
    expect(merged.value.telemetry.endpoint).toBe(
      "https://collector.example.com"
    );
  });

  test("leaves the input resolution untouched", () => {
    const initial: ConfigResolution = {
      value: defaultConfig,
      sources: defaultSources,
    };
    mergeConfig(initial, { printer: { controlEscape: false } }, "user");
    expect(defaultConfig.printer.controlEscape).toBe(true);
    expect(defaultSources.printer.controlEscape).toBe("default");
  });
});

describe("readEnvConfig", () => {
  test("parses booleans, integers and strings", () => {
    expect(
      readEnvConfig({
        YAMLSHADE_THEME: " github ",
        YAMLSHADE_CONTROL_ESCAPE: "off",
        YAMLSHADE_TAB_WIDTH: "4",
        YAMLSHADE_WIDTH: "100",
        YAMLSHADE_CONTEXT_LINES: "0",
        YAMLSHADE_TELEMETRY_EXPORTER: "Console",
      })
    ).toEqual({
      theme: "github",
      printer: { controlEscape: false, tabWidth: 4, width: 100 },
      diff: { contextLines: 0 },
      telemetry: { exporter: "console" },
    });
  });

  test("rejects values it cannot parse", () => {
    const error = expectValidationFailure(() =>
      readEnvConfig({ YAMLSHADE_TELEMETRY_ENABLED: "maybe" })
    );
    expect(error.message).toBe(
      "Invalid boolean for YAMLSHADE_TELEMETRY_ENABLED: maybe"
    );
  });

  test("returns an empty layer for an empty environment", () => {
    expect(readEnvConfig({})).toEqual({});
  });
});

describe("resolveConfig", () => {
  const directories: string[] = [];
  const tempDirectory = () => {
    const directory = mkdtempSync(join(tmpdir(), "yamlshade-config-"));
    directories.push(directory);
    return directory;
  };

  afterEach(() => {
    for (const directory of directories.splice(0)) {
      rmSync(directory, { recursive: true, force: true });
    }
  });

  test("layers project, user and env over the defaults", async () => {
    const cwd = tempDirectory();
    const home = tempDirectory();
    writeFileSync(
      join(cwd, "yamlshade.config.json"),
      JSON.stringify({ theme: "monokai", diff: { contextLines: 2 } })
    );
    mkdirSync(join(home, ".config", "yamlshade"), { recursive: true });
    writeFileSync(
      join(home, ".config", "yamlshade", "config.json"),
      JSON.stringify({ diff: { contextLines: 4 } })
    );

    const resolved = await Effect.runPromise(
      resolveConfig({ cwd, home, env: { YAMLSHADE_TAB_WIDTH: "2" } })
    );

    expect(resolved.config.theme).toBe("monokai");
    expect(resolved.sources.theme).toBe("project");
    expect(resolved.config.diff.contextLines).toBe(4);
    expect(resolved.sources.diff.contextLines).toBe("user");
    expect(resolved.config.printer.tabWidth).toBe(2);
    expect(resolved.sources.printer.tabWidth).toBe("env");
    expect(resolved.paths.project).toBe(join(cwd, "yamlshade.config.json"));
  });

  test("fails with ConfigValidationError on a malformed file", async () => {
    const cwd = tempDirectory();
    writeFileSync(join(cwd, "yamlshade.config.json"), "{ not json");

    const result = await Effect.runPromise(
      Effect.either(resolveConfig({ cwd, home: tempDirectory(), env: {} }))
    );

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(ConfigValidationError);
      expect(result.left.source).toBe("project");
    }
  });
});
