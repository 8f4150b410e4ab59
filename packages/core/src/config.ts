import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type { AppConfig, DemuxConfig, InputConfig, OutputConfig, ServerConfig } from "@scardlens/contracts";
import { DEFAULT_MAX_CONSECUTIVE_GARBAGE, DEFAULT_SWITCH_YIELD_MS } from "./demux.js";
import { ConfigError } from "./errors.js";
import { asRecord } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".scardlens", "config.toml");

export const DEFAULT_CONFIG: AppConfig = {
  input: {
    tracePath: "~/pcsc-spy",
  },
  output: {
    color: true,
    diffable: false,
    indentWidth: 4,
    showReport: true,
  },
  demux: {
    switchYieldMs: DEFAULT_SWITCH_YIELD_MS,
    maxConsecutiveGarbage: DEFAULT_MAX_CONSECUTIVE_GARBAGE,
  },
  server: {
    host: "127.0.0.1",
    port: 8788,
    logger: false,
  },
};

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function nonNegativeIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric < 0) return fallback;
  return Math.round(numeric);
}

function booleanOrDefault(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function stringOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function mergeInput(input: Record<string, unknown>): InputConfig {
  return {
    tracePath: stringOrDefault(input.tracePath, DEFAULT_CONFIG.input.tracePath),
  };
}

function mergeOutput(input: Record<string, unknown>): OutputConfig {
  const defaults = DEFAULT_CONFIG.output;
  return {
    color: booleanOrDefault(input.color, defaults.color),
    diffable: booleanOrDefault(input.diffable, defaults.diffable),
    indentWidth: nonNegativeIntOrDefault(input.indentWidth, defaults.indentWidth),
    showReport: booleanOrDefault(input.showReport, defaults.showReport),
  };
}

function mergeDemux(input: Record<string, unknown>): DemuxConfig {
  const defaults = DEFAULT_CONFIG.demux;
  return {
    switchYieldMs: nonNegativeIntOrDefault(input.switchYieldMs, defaults.switchYieldMs),
    maxConsecutiveGarbage: nonNegativeIntOrDefault(input.maxConsecutiveGarbage, defaults.maxConsecutiveGarbage),
  };
}

function mergeServer(input: Record<string, unknown>): ServerConfig {
  const defaults = DEFAULT_CONFIG.server;
  const port = toFiniteNumber(input.port);
  return {
    host: stringOrDefault(input.host, defaults.host),
    port: port !== null && port > 0 && port < 65_536 ? Math.round(port) : defaults.port,
    logger: booleanOrDefault(input.logger, defaults.logger),
  };
}

export function mergeConfig(input?: unknown): AppConfig {
  const root = asRecord(input);
  return {
    input: mergeInput(asRecord(root.input)),
    output: mergeOutput(asRecord(root.output)),
    demux: mergeDemux(asRecord(root.demux)),
    server: mergeServer(asRecord(root.server)),
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return mergeConfig();
    }
    throw error;
  }

  try {
    return mergeConfig(TOML.parse(raw));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(message, configPath);
  }
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(config as unknown as JsonMap);
  await writeFile(configPath, content, "utf8");
}
