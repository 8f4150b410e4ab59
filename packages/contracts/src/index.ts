export type TraceDirection = "enter" | "field" | "exit";
export type FieldDirection = "in" | "out";
export type DecodedLineKind = "call" | "in" | "out" | "result" | "detail" | "garbage" | "error";
export type SessionStatus = "completed" | "failed";

export interface TraceTimestamp {
  sec: number;
  usec: number;
}

export interface TraceLine {
  threadId: string;
  direction: TraceDirection;
  timestamp: TraceTimestamp | null;
  payload: string;
}

export interface CallHeader {
  threadId: string;
  timestamp: TraceTimestamp;
  functionName: string;
}

export interface CallExit {
  timestamp: TraceTimestamp;
  returnCode: number;
  returnCodeText: string;
}

export interface DecodedField {
  direction: FieldDirection;
  label: string;
  raw: string;
  text: string;
}

export interface CallRecord {
  functionName: string;
  threadId: string;
  startTime: TraceTimestamp;
  endTime: TraceTimestamp;
  elapsedSeconds: number;
  fields: DecodedField[];
  returnCode: number;
  returnSymbol: string;
  success: boolean;
}

export interface DecodedLine {
  threadId: string;
  position: number;
  kind: DecodedLineKind;
  text: string;
  highlight: boolean;
}

export interface FunctionStat {
  name: string;
  occurrences: number;
  totalElapsed: number;
  executions: number[];
}

export interface RankedFunctionStat extends FunctionStat {
  percentOfTotal: number | null;
}

export type SessionOutcome = { status: "completed" } | { status: "failed"; reason: string };

export interface ThreadReport {
  threadId: string;
  position: number;
  status: SessionStatus;
  failureReason: string;
  /** Lines dropped because they arrived after the session failed. */
  discardedLines: number;
  totalCalls: number;
  totalElapsed: number;
  functions: RankedFunctionStat[];
}

export interface FinalReport {
  totalElapsedSeconds: number;
  threads: ThreadReport[];
}

export interface InputConfig {
  tracePath: string;
}

export interface OutputConfig {
  color: boolean;
  diffable: boolean;
  indentWidth: number;
  showReport: boolean;
}

export interface DemuxConfig {
  switchYieldMs: number;
  maxConsecutiveGarbage: number;
}

export interface ServerConfig {
  host: string;
  port: number;
  logger: boolean;
}

export interface AppConfig {
  input: InputConfig;
  output: OutputConfig;
  demux: DemuxConfig;
  server: ServerConfig;
}
