import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import { loadConfig } from "@scardlens/core";
import { type CliIO, createProgram } from "./program.js";

const TRACE = [
  "T@>|1|0|SCardIsValidContext",
  "T@0x0000ABCD",
  "T@<|1|10|0x00000000",
];

interface Captured {
  io: CliIO;
  out: string[];
}

function capture(stdinLines: string[] = []): Captured {
  const out: string[] = [];
  return {
    out,
    io: {
      out: (line) => out.push(line),
      err: (line) => out.push(`ERR ${line}`),
      stdin: Readable.from(stdinLines.map((line) => `${line}\n`)),
    },
  };
}

async function fixture(): Promise<{ root: string; tracePath: string; configPath: string }> {
  const root = await mkdtemp(path.join(os.tmpdir(), "scardlens-cli-"));
  const tracePath = path.join(root, "trace.txt");
  await writeFile(tracePath, `${TRACE.join("\n")}\n`, "utf8");
  return { root, tracePath, configPath: path.join(root, "config.toml") };
}

async function run(captured: Captured, args: string[]): Promise<void> {
  await createProgram(captured.io).parseAsync(args, { from: "user" });
}

describe("scardlens cli", () => {
  it("decodes a trace file and prints the report", async () => {
    const { tracePath, configPath } = await fixture();
    const captured = capture();
    await run(captured, ["--config", configPath, "decode", tracePath, "--no-color", "--switch-yield", "0"]);

    expect(captured.out).toEqual([
      "SCardIsValidContext",
      " i hContext: 0x0000ABCD",
      " => SCARD_S_SUCCESS (0x00000000) [0.000010]",
      "",
      "Results sorted by total execution time",
      "total time: 0.000010 sec",
      "",
      "Thread 1/1: T",
      "0.000010 sec (   1 calls) 100.00% SCardIsValidContext",
    ]);
  });

  it("reads stdin and emits JSON lines", async () => {
    const { configPath } = await fixture();
    const captured = capture(TRACE);
    await run(captured, ["--config", configPath, "decode", "-", "--jsonl", "--diffable"]);

    const rows: unknown[] = captured.out.map((line) => JSON.parse(line));
    expect(rows).toHaveLength(4);
    expect(rows[1]).toEqual({
      threadId: "T",
      position: 0,
      kind: "in",
      text: "hContext: 0x????????",
      highlight: false,
    });
    expect(rows[3]).toMatchObject({ report: { threads: [{ threadId: "T", totalCalls: 1 }] } });
  });

  it("skips the report when asked", async () => {
    const { tracePath, configPath } = await fixture();
    const captured = capture();
    await run(captured, ["--config", configPath, "decode", tracePath, "--no-color", "--no-report", "--switch-yield", "0"]);
    expect(captured.out).toHaveLength(3);
  });

  it("rejects a malformed numeric option", async () => {
    const { tracePath, configPath } = await fixture();
    await expect(
      run(capture(), ["--config", configPath, "decode", tracePath, "--max-garbage", "lots"]),
    ).rejects.toThrow('--max-garbage expects a non-negative integer, got "lots"');
  });

  it("looks up constants", async () => {
    const captured = capture();
    await run(captured, ["tables", "scopes", "0x2"]);
    await run(captured, ["tables", "dispositions"]);
    expect(captured.out).toEqual([
      "SCARD_SCOPE_SYSTEM",
      "0x00000000 SCARD_LEAVE_CARD",
      "0x00000001 SCARD_RESET_CARD",
      "0x00000002 SCARD_UNPOWER_CARD",
      "0x00000003 SCARD_EJECT_CARD",
    ]);
    await expect(run(capture(), ["tables", "nope"])).rejects.toThrow("unknown table: nope");
  });

  it("gets and sets config values", async () => {
    const { configPath } = await fixture();
    const captured = capture();
    await run(captured, ["--config", configPath, "config", "set", "demux.switchYieldMs", "0"]);
    expect(captured.out).toEqual(["updated demux.switchYieldMs"]);
    expect((await loadConfig(configPath)).demux.switchYieldMs).toBe(0);

    const getter = capture();
    await run(getter, ["--config", configPath, "config", "get"]);
    expect(JSON.parse(getter.out.join("\n"))).toMatchObject({ demux: { switchYieldMs: 0, maxConsecutiveGarbage: 64 } });
  });
});
