import type {
  CallRecord,
  FinalReport,
  FunctionStat,
  RankedFunctionStat,
  SessionStatus,
  ThreadReport,
} from "@scardlens/contracts";
import { formatSeconds } from "./utils.js";

interface ThreadStats {
  threadId: string;
  position: number;
  status: SessionStatus;
  failureReason: string;
  discardedLines: number;
  functions: Map<string, FunctionStat>;
}

function percentOf(part: number, total: number): number | null {
  if (!(total > 0)) return null;
  return (part / total) * 100;
}

/**
 * Per-thread call statistics. Each thread's map is only written by that
 * thread's decoder, and `record` runs to completion before another session
 * resumes.
 */
export class StatisticsAggregator {
  private readonly threads = new Map<string, ThreadStats>();

  register(threadId: string, position = this.threads.size): void {
    if (this.threads.has(threadId)) return;
    this.threads.set(threadId, {
      threadId,
      position,
      status: "completed",
      failureReason: "",
      discardedLines: 0,
      functions: new Map(),
    });
  }

  private thread(threadId: string): ThreadStats {
    this.register(threadId);
    const stats = this.threads.get(threadId);
    if (!stats) {
      throw new Error(`thread ${threadId} is not registered`);
    }
    return stats;
  }

  record(threadId: string, call: CallRecord): void {
    const functions = this.thread(threadId).functions;
    let stat = functions.get(call.functionName);
    if (!stat) {
      stat = { name: call.functionName, occurrences: 0, totalElapsed: 0, executions: [] };
      functions.set(call.functionName, stat);
    }
    stat.occurrences += 1;
    stat.totalElapsed += call.elapsedSeconds;
    stat.executions.push(call.elapsedSeconds);
  }

  markFailed(threadId: string, reason: string): void {
    const stats = this.thread(threadId);
    stats.status = "failed";
    stats.failureReason = reason;
  }

  discard(threadId: string): void {
    this.thread(threadId).discardedLines += 1;
  }

  functionStats(threadId: string): FunctionStat[] {
    return Array.from(this.threads.get(threadId)?.functions.values() ?? []);
  }

  report(totalElapsedWallClock: number): FinalReport {
    const threads = Array.from(this.threads.values())
      .sort((a, b) => a.position - b.position)
      .map((stats): ThreadReport => {
        // Array.prototype.sort is stable: ties keep first-seen order
        const functions = Array.from(stats.functions.values())
          .sort((a, b) => b.totalElapsed - a.totalElapsed)
          .map(
            (stat): RankedFunctionStat => ({
              name: stat.name,
              occurrences: stat.occurrences,
              totalElapsed: stat.totalElapsed,
              executions: [...stat.executions],
              percentOfTotal: percentOf(stat.totalElapsed, totalElapsedWallClock),
            }),
          );
        return {
          threadId: stats.threadId,
          position: stats.position,
          status: stats.status,
          failureReason: stats.failureReason,
          discardedLines: stats.discardedLines,
          totalCalls: functions.reduce((sum, stat) => sum + stat.occurrences, 0),
          totalElapsed: functions.reduce((sum, stat) => sum + stat.totalElapsed, 0),
          functions,
        };
      });

    return { totalElapsedSeconds: totalElapsedWallClock, threads };
  }
}

function fmtPercent(value: number | null): string {
  if (value === null) return "   n/a";
  return `${value.toFixed(2).padStart(6)}%`;
}

export function formatReport(report: FinalReport): string[] {
  const lines = [
    "Results sorted by total execution time",
    `total time: ${formatSeconds(report.totalElapsedSeconds)} sec`,
  ];
  const threadCount = report.threads.length;
  for (const [index, thread] of report.threads.entries()) {
    lines.push("");
    lines.push(`Thread ${index + 1}/${threadCount}: ${thread.threadId}`);
    if (thread.status === "failed") {
      lines.push(`session failed: ${thread.failureReason}`);
    }
    if (thread.discardedLines > 0) {
      lines.push(`${thread.discardedLines} lines discarded after the failure`);
    }
    if (thread.functions.length === 0) {
      lines.push("no completed calls");
      continue;
    }
    for (const stat of thread.functions) {
      lines.push(
        `${formatSeconds(stat.totalElapsed)} sec (${String(stat.occurrences).padStart(4)} calls) ${fmtPercent(stat.percentOfTotal)} ${stat.name}`,
      );
    }
  }
  return lines;
}
