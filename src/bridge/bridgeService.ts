import { performance } from "node:perf_hooks";
import type { AuditLogger } from "../audit/auditLogger.js";
import { SourceKitError } from "../sourcekit/errors.js";
import type { DictionaryValue, ResponseValue } from "../sourcekit/responseValue.js";
import type { SourceKitService } from "../sourcekit/service.js";
import { clipText } from "../utils/strings.js";
import type {
  BridgeCommand,
  BridgeRequest,
  BridgeResponse,
  RequestSendBody,
  UidFromStringBody,
  UidStringBody,
} from "./protocol.js";
import type { BridgeTransport } from "./transport.js";
import { decodeWireValue, encodeWireValue } from "./wireCodec.js";

export interface BridgeServiceOptions {
  transport: BridgeTransport;
  timeoutMs: number;
  audit?: AuditLogger;
  onStderr?: (text: string) => void;
}

interface PendingRequest {
  command: BridgeCommand;
  resolve: (body: unknown) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

function parseResponse(line: string): BridgeResponse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new SourceKitError("bridge_protocol_error", `Bridge wrote a non-JSON line: ${clipText(line, 200)}`);
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new SourceKitError("bridge_protocol_error", "Bridge response is not an object.");
  }
  const candidate: Record<string, unknown> = { ...parsed };
  if (typeof candidate.seq !== "number" || typeof candidate.success !== "boolean") {
    throw new SourceKitError(
      "bridge_protocol_error",
      "Bridge response needs a numeric seq and a boolean success.",
    );
  }
  return {
    seq: candidate.seq,
    success: candidate.success,
    message: typeof candidate.message === "string" ? candidate.message : undefined,
    body: candidate.body,
  };
}

function bodyField(body: unknown, field: string, command: BridgeCommand): unknown {
  if (!body || typeof body !== "object" || !(field in body)) {
    throw new SourceKitError(
      "bridge_protocol_error",
      `Reply to ${command} is missing "${field}".`,
      { command, field },
    );
  }
  const record: Record<string, unknown> = { ...body };
  return record[field];
}

function readUidFromStringBody(body: unknown, name: string): UidFromStringBody {
  const uid = bodyField(body, "uid", "uid.get_from_string");
  if (typeof uid !== "string" || !/^\d+$/u.test(uid)) {
    throw new SourceKitError("bridge_protocol_error", `Bridge returned an invalid UID for "${name}".`, {
      name,
    });
  }
  return { uid };
}

function readUidStringBody(body: unknown, uid: bigint): UidStringBody {
  const name = bodyField(body, "name", "uid.get_string");
  if (name !== null && typeof name !== "string") {
    throw new SourceKitError("bridge_protocol_error", `Bridge returned a non-string name for UID ${uid}.`, {
      uid: uid.toString(),
    });
  }
  return { name };
}

function readRequestSendBody(body: unknown): RequestSendBody {
  return { response: bodyField(body, "response", "request.send") };
}

/**
 * `SourceKitService` backed by a helper process that links sourcekitd and
 * speaks the line protocol in ./protocol.ts.
 */
export class BridgeService implements SourceKitService {
  private readonly transport: BridgeTransport;
  private readonly timeoutMs: number;
  private readonly audit: AuditLogger | undefined;
  private readonly onStderr: (text: string) => void;
  private readonly pending = new Map<number, PendingRequest>();
  private seq = 0;
  private started = false;

  public constructor(options: BridgeServiceOptions) {
    this.transport = options.transport;
    this.timeoutMs = options.timeoutMs;
    this.audit = options.audit;
    this.onStderr = options.onStderr ?? (() => undefined);
  }

  public async initialize(): Promise<void> {
    await this.call("initialize");
  }

  public async uidForString(name: string): Promise<bigint> {
    const body = readUidFromStringBody(await this.call("uid.get_from_string", { name }), name);
    return BigInt(body.uid);
  }

  public async stringForUid(uid: bigint): Promise<string | undefined> {
    const body = readUidStringBody(await this.call("uid.get_string", { uid: uid.toString() }), uid);
    return body.name ?? undefined;
  }

  public async sendRequest(request: DictionaryValue): Promise<ResponseValue> {
    const body = readRequestSendBody(await this.call("request.send", { request: encodeWireValue(request) }));
    return decodeWireValue(body.response, "$.response");
  }

  public async shutdown(): Promise<void> {
    if (!this.started) {
      return;
    }
    try {
      await this.call("shutdown");
    } finally {
      this.started = false;
      await this.transport.close();
    }
  }

  private start(): void {
    if (this.started) {
      return;
    }
    this.transport.start({
      onLine: (line) => this.handleLine(line),
      onStderr: (text) => this.onStderr(text),
      onExit: (code) => {
        this.started = false;
        this.rejectAll(
          new SourceKitError("bridge_unavailable", `Bridge process exited with code ${code}.`, { code }),
        );
      },
      onError: (error) => {
        this.started = false;
        this.rejectAll(
          new SourceKitError("bridge_unavailable", `Bridge process failed: ${error.message}`),
        );
      },
    });
    this.started = true;
  }

  private async call(command: BridgeCommand, args?: Record<string, unknown>): Promise<unknown> {
    this.start();
    this.seq += 1;
    const request: BridgeRequest = { seq: this.seq, command, arguments: args };
    const startedAt = performance.now();
    await this.audit?.record("bridge_request", { seq: request.seq, command });

    const reply = new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(request.seq);
        reject(
          new SourceKitError(
            "bridge_timeout",
            `Bridge request ${request.seq} (${command}) timed out after ${this.timeoutMs}ms.`,
            { seq: request.seq, command },
          ),
        );
      }, this.timeoutMs);
      this.pending.set(request.seq, { command, resolve, reject, timer });
    });

    try {
      this.transport.send(JSON.stringify(request));
    } catch (error) {
      this.settle(request.seq)?.reject(
        new SourceKitError("bridge_unavailable", `Could not write to bridge: ${(error as Error).message}`),
      );
    }

    let success = false;
    try {
      const body = await reply;
      success = true;
      return body;
    } finally {
      await this.audit?.record("bridge_response", {
        seq: request.seq,
        command,
        success,
        durationMs: Math.round(performance.now() - startedAt),
      });
    }
  }

  private handleLine(line: string): void {
    let response: BridgeResponse;
    try {
      response = parseResponse(line);
    } catch (error) {
      this.rejectAll(error instanceof Error ? error : new Error(String(error)));
      return;
    }

    const pending = this.settle(response.seq);
    if (!pending) {
      return;
    }
    if (response.success) {
      pending.resolve(response.body);
      return;
    }
    pending.reject(
      new SourceKitError(
        "bridge_request_failed",
        response.message ?? `Bridge reported failure for ${pending.command}.`,
        { seq: response.seq, command: pending.command },
      ),
    );
  }

  private settle(seq: number): PendingRequest | undefined {
    const pending = this.pending.get(seq);
    if (!pending) {
      return undefined;
    }
    clearTimeout(pending.timer);
    this.pending.delete(seq);
    return pending;
  }

  private rejectAll(error: Error): void {
    for (const seq of [...this.pending.keys()]) {
      this.settle(seq)?.reject(error);
    }
  }
}
