import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import type { Config, ConfigInput, ConfigResolution, ConfigSources } from "./config.js";
import {
  ConfigValidationError,
  decodeConfigInput,
  decodeConfigInputJson,
  defaultConfig,
  defaultSources,
  mergeConfig,
} from "./config.js";

export const PROJECT_CONFIG_FILE = "yamlshade.config.json";

const truthyValues = new Set(["1", "true", "yes", "on"]);
const falsyValues = new Set(["0", "false", "no", "off"]);

type Env = Readonly<Record<string, string | undefined>>;

const invalidEnv = (key: string, value: string, expected: string) =>
  new ConfigValidationError({
    source: "env",
    message: `Invalid ${expected} for ${key}: ${value}`,
  });

function parseBooleanEnv(env: Env, key: string): boolean | undefined {
  const value = env[key];
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (truthyValues.has(normalized)) {
    return true;
  }
  if (falsyValues.has(normalized)) {
    return false;
  }
  throw invalidEnv(key, value, "boolean");
}

function parseIntegerEnv(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw invalidEnv(key, value, "integer");
  }
  return parsed;
}

function parseStringEnv(env: Env, key: string): string | undefined {
  const trimmed = env[key]?.trim();
  return trimmed ? trimmed : undefined;
}

function stripUndefined(input: Record<string, unknown>) {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      output[key] = value;
    }
  }
  return output;
}

/** Reads the `YAMLSHADE_*` variables into a config layer. */
export function readEnvConfig(env: Env): ConfigInput {
  const raw: Record<string, unknown> = {};
  const theme = parseStringEnv(env, "YAMLSHADE_THEME");
  if (theme) {
    raw.theme = theme;
  }
  const printer = stripUndefined({
    controlEscape: parseBooleanEnv(env, "YAMLSHADE_CONTROL_ESCAPE"),
    tabWidth: parseIntegerEnv(env, "YAMLSHADE_TAB_WIDTH"),
    width: parseIntegerEnv(env, "YAMLSHADE_WIDTH"),
  });
  if (Object.keys(printer).length > 0) {
    raw.printer = printer;
  }
  const diff = stripUndefined({
    contextLines: parseIntegerEnv(env, "YAMLSHADE_CONTEXT_LINES"),
  });
  if (Object.keys(diff).length > 0) {
    raw.diff = diff;
  }
  const telemetry = stripUndefined({
    enabled: parseBooleanEnv(env, "YAMLSHADE_TELEMETRY_ENABLED"),
    exporter: parseStringEnv(env, "YAMLSHADE_TELEMETRY_EXPORTER")?.toLowerCase(),
    endpoint: parseStringEnv(env, "YAMLSHADE_TELEMETRY_ENDPOINT"),
  });
  if (Object.keys(telemetry).length > 0) {
    raw.telemetry = telemetry;
  }
  return decodeConfigInput("env", raw);
}

function readConfigFile(path: string, source: string): ConfigInput | null {
  if (!existsSync(path)) {
    return null;
  }
  return decodeConfigInputJson(source, readFileSync(path, "utf8"));
}

export interface ResolveConfigOptions {
  readonly cwd?: string;
  readonly home?: string;
  readonly env?: Env;
}

export interface ResolvedConfig {
  config: Config;
  sources: ConfigSources;
  paths: {
    project: string;
    user: string;
  };
}

/**
 * Layers the project file, the user file and the environment over the
 * defaults, later layers winning.
 */
export const resolveConfig = (options: ResolveConfigOptions = {}) =>
  Effect.try({
    try: (): ResolvedConfig => {
      const projectPath = join(options.cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
      const userPath = join(
        options.home ?? homedir(),
        ".config",
        "yamlshade",
        "config.json"
      );

      let resolution: ConfigResolution = {
        value: defaultConfig,
        sources: defaultSources,
      };

      const projectConfig = readConfigFile(projectPath, "project");
      if (projectConfig) {
        resolution = mergeConfig(resolution, projectConfig, "project");
      }

      const userConfig = readConfigFile(userPath, "user");
      if (userConfig) {
        resolution = mergeConfig(resolution, userConfig, "user");
      }

      resolution = mergeConfig(
        resolution,
        readEnvConfig(options.env ?? process.env),
        "env"
      );

      return {
        config: resolution.value,
        sources: resolution.sources,
        paths: {
          project: projectPath,
          user: userPath,
        },
      };
    },
    catch: (error) =>
      error instanceof ConfigValidationError
        ? error
        : new ConfigValidationError({
            source: "filesystem",
            message: error instanceof Error ? error.message : String(error),
          }),
  });
