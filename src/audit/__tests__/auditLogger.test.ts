import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AuditLogger } from "../auditLogger.js";

describe("AuditLogger", () => {
  let tempDir = "";

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "sourcekit-json-audit-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("appends one JSON line per event", async () => {
    const audit = new AuditLogger(tempDir, "run-1");

    await audit.log("bridge_request", { seq: 1 });
    await audit.log("bridge_response", { seq: 1, success: true });

    expect(audit.getAuditPath()).toBe(path.join(tempDir, "audit", "run-1.jsonl"));
    const events = (await fs.readFile(audit.getAuditPath(), "utf8"))
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(events.map((event) => [event.sessionId, event.type, event.data])).toEqual([
      ["run-1", "bridge_request", { seq: 1 }],
      ["run-1", "bridge_response", { seq: 1, success: true }],
    ]);
  });

  it("warns once and stops when the log cannot be written", async () => {
    const blocker = path.join(tempDir, "state");
    await fs.writeFile(blocker, "not a directory", "utf8");
    const warn = vi.fn();
    const audit = new AuditLogger(blocker, "run-2", warn);

    await audit.record("bridge_request", { seq: 1 });
    await audit.record("bridge_request", { seq: 2 });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/^Audit log disabled, could not write /u);
  });

  it("derives session ids from the clock", () => {
    expect(AuditLogger.newSessionId(new Date("2026-01-02T03:04:05.678Z"))).toBe("2026-01-02T03-04-05-678Z");
  });
});
