import { type CodeTable, PCSC_TABLES, lookup } from "../tables.js";

/**
 * Control-code names for one session: the well-known codes plus whatever a
 * feature request taught this session. Never shared between sessions.
 */
export class SessionControlCodes {
  private readonly learned = new Map<number, string>();

  constructor(private readonly known: CodeTable = PCSC_TABLES.controlCodes) {}

  lookup(code: number): string {
    return this.learned.get(code) ?? lookup(this.known, code);
  }

  learn(code: number, name: string): void {
    this.learned.set(code, name);
  }
}
