import type { Readable } from "node:stream";
import { Command } from "commander";
import type { AppConfig, FinalReport } from "@scardlens/contracts";
import {
  DEFAULT_CONFIG_PATH,
  Demultiplexer,
  PCSC_TABLES,
  TABLE_NAMES,
  formatDecodedLine,
  formatHex32,
  formatReport,
  isTableName,
  lineSourceFromStream,
  loadConfig,
  lookup,
  mergeConfig,
  openTraceFile,
  parseHex,
  saveConfig,
} from "@scardlens/core";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  stdin: Readable;
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  stdin: process.stdin,
};

interface DecodeOptions {
  color?: boolean;
  diffable?: boolean;
  report?: boolean;
  jsonl?: boolean;
  switchYield?: string;
  maxGarbage?: string;
}

function parseCount(value: string | undefined, flag: string, fallback: number): number {
  if (value === undefined) return fallback;
  const numeric = Number(value);
  if (!Number.isInteger(numeric) || numeric < 0) {
    throw new Error(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return numeric;
}

function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  return input;
}

function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  if (parts.length === 0) return;

  let cursor: Record<string, unknown> = target;
  for (let i = 0; i < parts.length - 1; i += 1) {
    const key = parts[i];
    if (!key) continue;
    const next = cursor[key];
    if (!next || typeof next !== "object" || Array.isArray(next)) {
      cursor[key] = {};
    }
    cursor = cursor[key] as Record<string, unknown>;
  }
  const lastKey = parts[parts.length - 1];
  if (!lastKey) return;
  cursor[lastKey] = value;
}

async function runDecode(io: CliIO, config: AppConfig, trace: string | undefined, opts: DecodeOptions): Promise<FinalReport> {
  const tracePath = trace ?? config.input.tracePath;
  const render = { color: opts.color ?? config.output.color, indentWidth: config.output.indentWidth };
  const demux = new Demultiplexer({
    diffable: opts.diffable ?? config.output.diffable,
    switchYieldMs: parseCount(opts.switchYield, "--switch-yield", config.demux.switchYieldMs),
    maxConsecutiveGarbage: parseCount(opts.maxGarbage, "--max-garbage", config.demux.maxConsecutiveGarbage),
    sink: {
      line: (line) => io.out(opts.jsonl ? JSON.stringify(line) : formatDecodedLine(line, render)),
    },
  });

  const source = tracePath === "-" ? lineSourceFromStream(io.stdin) : openTraceFile(tracePath);
  let report: FinalReport;
  try {
    report = await demux.run(source);
  } finally {
    source.close?.();
  }

  if (opts.jsonl) {
    io.out(JSON.stringify({ report }));
  } else if (opts.report ?? config.output.showReport) {
    io.out("");
    for (const line of formatReport(report)) {
      io.out(line);
    }
  }
  return report;
}

function runTables(io: CliIO, table: string, code: string | undefined): void {
  if (!isTableName(table)) {
    throw new Error(`unknown table: ${table} (expected one of ${TABLE_NAMES.join(", ")})`);
  }
  const entries = PCSC_TABLES[table];
  if (code === undefined) {
    for (const [value, name] of entries) {
      io.out(`${formatHex32(value)} ${name}`);
    }
    return;
  }
  const value = parseHex(code);
  if (value === null) {
    throw new Error(`not a hexadecimal code: ${code}`);
  }
  io.out(lookup(entries, value));
}

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name("scardlens")
    .description("Decode PC/SC spy traces into per-call listings and per-thread statistics")
    .option("--config <path>", "Config path", DEFAULT_CONFIG_PATH);

  program
    .command("decode [trace]")
    .description("Decode a spy FIFO or recorded trace (\"-\" reads stdin)")
    .option("--color", "Colorize output")
    .option("--no-color", "Disable colors")
    .option("--diffable", "Mask handles, pointers and timings so runs can be diffed")
    .option("--report", "Print the statistics report at the end")
    .option("--no-report", "Skip the statistics report")
    .option("--jsonl", "Emit one JSON object per decoded line, then the report")
    .option("--switch-yield <ms>", "Pause when the trace switches thread")
    .option("--max-garbage <n>", "Consecutive unparseable lines tolerated per thread")
    .action(async (trace: string | undefined, opts: DecodeOptions) => {
      const config = await loadConfig(program.opts<{ config: string }>().config);
      await runDecode(io, config, trace, opts);
    });

  program
    .command("tables <table> [code]")
    .description(`Look up a PC/SC constant (${TABLE_NAMES.join(", ")})`)
    .action((table: string, code: string | undefined) => {
      runTables(io, table, code);
    });

  const configCmd = program.command("config").description("Configuration");

  configCmd.command("get").action(async () => {
    const config = await loadConfig(program.opts<{ config: string }>().config);
    io.out(JSON.stringify(config, null, 2));
  });

  configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
    const configPath = program.opts<{ config: string }>().config;
    const config = await loadConfig(configPath);
    const mutable: Record<string, unknown> = { ...structuredClone(config) };
    setPath(mutable, key, parseValue(value));
    await saveConfig(mergeConfig(mutable), configPath);
    io.out(`updated ${key}`);
  });

  return program;
}
