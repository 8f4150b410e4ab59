import type { DecodedLine } from "@scardlens/contracts";
import { describe, expect, it } from "vitest";
import { Demultiplexer, decodeTraceText } from "./demux.js";
import { StreamCorruptedError, TraceFramingError } from "./errors.js";
import { lineSourceFromLines } from "./lineSource.js";
import { isValidContextCall, spyCall, traceText } from "./__tests__/fixtures.js";

function shown(lines: DecodedLine[]): Array<[string, string]> {
  return lines.map((line) => [line.kind, line.text]);
}

function zip(a: string[], b: string[]): string[] {
  const merged: string[] = [];
  for (let index = 0; index < Math.max(a.length, b.length); index += 1) {
    const left = a[index];
    const right = b[index];
    if (left !== undefined) merged.push(left);
    if (right !== undefined) merged.push(right);
  }
  return merged;
}

describe("decodeTraceText", () => {
  it("decodes a single call with its fields and result", async () => {
    const { lines, report } = await decodeTraceText(
      traceText(spyCall("7F01", "SCardEstablishContext", [100, 0], [100, 250], ["0x00000002", "0x0000ABCD"])),
    );

    expect(shown(lines)).toEqual([
      ["call", "SCardEstablishContext"],
      ["in", "dwScope: SCARD_SCOPE_SYSTEM (0x00000002)"],
      ["out", "hContext: 0x0000ABCD"],
      ["result", "SCARD_S_SUCCESS (0x00000000) [0.000250]"],
    ]);
    expect(lines.every((line) => line.threadId === "7F01" && line.position === 0)).toBe(true);
    expect(report.totalElapsedSeconds).toBeCloseTo(0.00025, 9);
    expect(report.threads).toHaveLength(1);
    expect(report.threads[0]?.functions[0]).toMatchObject({ name: "SCardEstablishContext", occurrences: 1 });
  });

  it("highlights failed return codes and still counts the call", async () => {
    const { lines, report } = await decodeTraceText(
      traceText(isValidContextCall("T", [5, 0], [5, 10], "0x80100002")),
    );

    expect(lines.at(-1)).toEqual({
      threadId: "T",
      position: 0,
      kind: "result",
      text: "SCARD_E_CANCELLED (0x80100002) [0.000010]",
      highlight: true,
    });
    expect(report.threads[0]?.functions[0]?.occurrences).toBe(1);
    expect(report.threads[0]?.status).toBe("completed");
  });

  it("borrows a second when the exit microseconds are smaller", async () => {
    const { lines, report } = await decodeTraceText(traceText(isValidContextCall("T", [10, 900000], [12, 100000])));
    expect(lines.at(-1)?.text).toBe("SCARD_S_SUCCESS (0x00000000) [1.200000]");
    expect(report.threads[0]?.functions[0]?.totalElapsed).toBeCloseTo(1.2, 9);
  });

  it("keeps interleaved threads apart and reports each one", async () => {
    const a: string[] = [];
    const b: string[] = [];
    for (let index = 0; index < 3; index += 1) {
      a.push(...isValidContextCall("A", [1 + index, 0], [1 + index, 100]));
      b.push(...isValidContextCall("B", [1 + index, 50], [1 + index, 150]));
    }
    const { lines, report } = await decodeTraceText(traceText(zip(a, b)));

    const perThread = (threadId: string) => shown(lines.filter((line) => line.threadId === threadId));
    const oneCall: Array<[string, string]> = [
      ["call", "SCardIsValidContext"],
      ["in", "hContext: 0x0000ABCD"],
      ["result", "SCARD_S_SUCCESS (0x00000000) [0.000100]"],
    ];
    expect(perThread("A")).toEqual([...oneCall, ...oneCall, ...oneCall]);
    expect(perThread("B")).toEqual([...oneCall, ...oneCall, ...oneCall]);
    expect(lines.filter((line) => line.threadId === "B").every((line) => line.position === 1)).toBe(true);

    expect(report.threads.map((thread) => [thread.threadId, thread.position])).toEqual([
      ["A", 0],
      ["B", 1],
    ]);
    expect(report.threads.map((thread) => thread.functions[0]?.occurrences)).toEqual([3, 3]);
    expect(report.totalElapsedSeconds).toBeCloseTo(2.00015, 9);
  });

  it("produces identical output for the same trace", async () => {
    const text = traceText([
      ...isValidContextCall("A", [1, 0], [1, 10]),
      ...isValidContextCall("B", [1, 20], [1, 40]),
    ]);
    const first = await decodeTraceText(text, { diffable: true });
    const second = await decodeTraceText(text, { diffable: true });
    expect(second.lines).toEqual(first.lines);
    expect(second.report).toEqual(first.report);
  });

  it("rejects a trace that does not open with an enter record", async () => {
    await expect(decodeTraceText("garbage\nT@>|1|0|SCardCancel\n")).rejects.toBeInstanceOf(TraceFramingError);
    await expect(decodeTraceText("garbage\n")).rejects.toThrow('trace does not start with an enter record: "garbage"');
    await expect(decodeTraceText("")).rejects.toThrow('trace does not start with an enter record: ""');
  });

  it("fails only the session whose return code is unknown", async () => {
    const { lines, report } = await decodeTraceText(
      traceText([
        ...isValidContextCall("A", [1, 0], [1, 10], "0x80100099"),
        ...isValidContextCall("B", [1, 20], [1, 40]),
        ...isValidContextCall("A", [1, 50], [1, 60]),
      ]),
    );

    expect(shown(lines.filter((line) => line.threadId === "A"))).toEqual([
      ["call", "SCardIsValidContext"],
      ["in", "hContext: 0x0000ABCD"],
      ["error", "SCardIsValidContext: unknown return code 0x80100099"],
    ]);
    expect(report.threads[0]).toMatchObject({
      threadId: "A",
      status: "failed",
      failureReason: "SCardIsValidContext: unknown return code 0x80100099",
      totalCalls: 0,
    });
    expect(report.threads[1]).toMatchObject({ threadId: "B", status: "completed", totalCalls: 1 });
  });

  it("drops lines for a thread whose session has failed", async () => {
    const later: string[] = [];
    for (let index = 0; index < 100; index += 1) {
      later.push(...isValidContextCall("A", [2, index * 10], [2, index * 10 + 5]));
    }
    const { lines, report } = await decodeTraceText(
      traceText([
        ...isValidContextCall("A", [1, 0], [1, 10], "0x80100099"),
        ...later,
        ...isValidContextCall("B", [3, 0], [3, 20]),
      ]),
    );

    expect(lines.filter((line) => line.threadId === "A")).toHaveLength(3);
    const threadA = report.threads[0];
    expect(threadA?.status).toBe("failed");
    expect(threadA?.discardedLines).toBeGreaterThanOrEqual(290);
    expect(threadA?.discardedLines).toBeLessThanOrEqual(300);
    expect(report.threads[1]).toMatchObject({ threadId: "B", status: "completed", discardedLines: 0, totalCalls: 1 });
  });

  it("fails a session whose stream ends inside a call", async () => {
    const { lines, report } = await decodeTraceText(traceText(["T@>|1|0|SCardConnect", "T@0x0000ABCD"]));
    expect(lines.at(-1)).toMatchObject({
      kind: "error",
      text: "SCardConnect: end of stream in the middle of the call",
      highlight: true,
    });
    expect(report.threads[0]?.status).toBe("failed");
    expect(report.totalElapsedSeconds).toBe(0);
  });

  it("reports a call cut short by the next enter record", async () => {
    const { lines } = await decodeTraceText(
      traceText(["T@>|1|0|SCardConnect", "T@0x0000ABCD", ...isValidContextCall("T", [1, 10], [1, 20])]),
    );
    expect(lines.at(-1)?.text).toBe("SCardConnect: new call started before the exit record: >|1|10|SCardIsValidContext");
  });

  it("skips the body of an unknown function until the next enter record", async () => {
    const { lines, report } = await decodeTraceText(
      traceText([
        ...spyCall("T", "SCardFrobnicate", [1, 0], [1, 5], ["0x00000001", "0x00000002"]),
        ...isValidContextCall("T", [1, 10], [1, 30]),
      ]),
    );

    expect(shown(lines)).toEqual([
      ["error", "Unknown function: SCardFrobnicate"],
      ["call", "SCardIsValidContext"],
      ["in", "hContext: 0x0000ABCD"],
      ["result", "SCARD_S_SUCCESS (0x00000000) [0.000020]"],
    ]);
    expect(report.threads[0]?.status).toBe("completed");
    expect(report.threads[0]?.functions.map((stat) => stat.name)).toEqual(["SCardIsValidContext"]);
  });

  it("gives up on a thread after too many unparseable lines", async () => {
    const { lines, report } = await decodeTraceText(
      traceText([...isValidContextCall("T", [1, 0], [1, 10]), "T@junk1", "T@junk2", "T@junk3"]),
      { maxConsecutiveGarbage: 2 },
    );

    expect(shown(lines.slice(3))).toEqual([
      ["garbage", "junk1"],
      ["garbage", "junk2"],
      ["garbage", "junk3"],
      ["error", "3 consecutive unparseable lines on thread T"],
    ]);
    expect(report.threads[0]).toMatchObject({
      status: "failed",
      failureReason: "3 consecutive unparseable lines on thread T",
      totalCalls: 1,
    });
  });

  it("shows lines without a thread id as garbage", async () => {
    const { lines } = await decodeTraceText(traceText([...isValidContextCall("T", [1, 0], [1, 10]), "noise"]));
    expect(lines.at(-1)).toEqual({ threadId: "", position: 0, kind: "garbage", text: "noise", highlight: false });
  });

  it("stops when too many consecutive lines carry no thread id", async () => {
    const text = traceText([...isValidContextCall("T", [1, 0], [1, 10]), "noise", "more noise"]);
    await expect(decodeTraceText(text, { maxConsecutiveGarbage: 1 })).rejects.toBeInstanceOf(StreamCorruptedError);
    await expect(decodeTraceText(text, { maxConsecutiveGarbage: 1 })).rejects.toThrow(
      "2 consecutive lines without a thread id",
    );
  });
});

describe("Demultiplexer", () => {
  it("streams decoded lines to the sink with a pause on thread switches", async () => {
    const seen: DecodedLine[] = [];
    const demux = new Demultiplexer({ switchYieldMs: 1, sink: { line: (line) => seen.push(line) } });
    const report = await demux.run(
      lineSourceFromLines([...isValidContextCall("A", [1, 0], [1, 10]), ...isValidContextCall("B", [1, 20], [1, 40])]),
    );

    expect(shown(seen.filter((line) => line.threadId === "A"))).toEqual([
      ["call", "SCardIsValidContext"],
      ["in", "hContext: 0x0000ABCD"],
      ["result", "SCARD_S_SUCCESS (0x00000000) [0.000010]"],
    ]);
    expect(shown(seen.filter((line) => line.threadId === "B"))).toEqual([
      ["call", "SCardIsValidContext"],
      ["in", "hContext: 0x0000ABCD"],
      ["result", "SCARD_S_SUCCESS (0x00000000) [0.000020]"],
    ]);
    expect(report.threads.map((thread) => thread.threadId)).toEqual(["A", "B"]);
    expect(report.totalElapsedSeconds).toBeCloseTo(0.00004, 9);
  });
});
