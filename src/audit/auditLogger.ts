import fs from "node:fs/promises";
import path from "node:path";

export interface AuditEvent {
  ts: string;
  sessionId: string;
  type: string;
  data: unknown;
}

export type AuditWarning = (message: string) => void;

/** Appends one JSON line per bridge event to `<stateDir>/audit/<sessionId>.jsonl`. */
export class AuditLogger {
  private readonly auditPath: string;
  private readonly sessionId: string;
  private readonly warn: AuditWarning;
  private initialized = false;
  private failed = false;

  public constructor(stateDir: string, sessionId: string, warn: AuditWarning = () => undefined) {
    const auditDir = path.resolve(stateDir, "audit");
    this.auditPath = path.resolve(auditDir, `${sessionId}.jsonl`);
    this.sessionId = sessionId;
    this.warn = warn;
  }

  public static newSessionId(now = new Date()): string {
    return now.toISOString().replace(/[:.]/gu, "-");
  }

  public getAuditPath(): string {
    return this.auditPath;
  }

  public async log(type: string, data: unknown): Promise<void> {
    if (!this.initialized) {
      await fs.mkdir(path.dirname(this.auditPath), { recursive: true });
      this.initialized = true;
    }
    const event: AuditEvent = {
      ts: new Date().toISOString(),
      sessionId: this.sessionId,
      type,
      data,
    };
    await fs.appendFile(this.auditPath, `${JSON.stringify(event)}\n`, "utf8");
  }

  /** Like `log`, but a write failure is reported once and auditing stops. */
  public async record(type: string, data: unknown): Promise<void> {
    if (this.failed) {
      return;
    }
    try {
      await this.log(type, data);
    } catch (error) {
      this.failed = true;
      this.warn(`Audit log disabled, could not write ${this.auditPath}: ${(error as Error).message}`);
    }
  }
}
