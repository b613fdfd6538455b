import { vi } from "vitest";
import { Keys, RequestKinds } from "../keys.js";
import {
  getInteger,
  getString,
  type DictionaryValue,
  type ResponseValue,
} from "../responseValue.js";
import type { SourceKitService } from "../service.js";

export const UIDS = {
  editorOpen: 4_300_000_001n,
  cursorInfo: 4_300_000_002n,
  keyword: 4_300_000_010n,
  identifier: 4_300_000_011n,
  docComment: 4_300_000_012n,
  declFunctionFree: 4_300_000_020n,
  declClass: 4_300_000_021n,
  commentMark: 4_300_000_022n,
  accessInternal: 4_300_000_023n,
  unnamed: 4_300_000_999n,
} as const;

export const NAMES = new Map<bigint, string>([
  [UIDS.editorOpen, RequestKinds.editorOpen],
  [UIDS.cursorInfo, RequestKinds.cursorInfo],
  [UIDS.keyword, "source.lang.swift.syntaxtype.keyword"],
  [UIDS.identifier, "source.lang.swift.syntaxtype.identifier"],
  [UIDS.docComment, "source.lang.swift.syntaxtype.doccomment"],
  [UIDS.declFunctionFree, "source.lang.swift.decl.function.free"],
  [UIDS.declClass, "source.lang.swift.decl.class"],
  [UIDS.commentMark, "source.lang.swift.syntaxtype.comment.mark"],
  [UIDS.accessInternal, "source.lang.swift.accessibility.internal"],
]);

export function createLookup(names: Map<bigint, string> = NAMES) {
  return vi.fn(async (uid: bigint): Promise<string | undefined> => names.get(uid));
}

export interface RawToken {
  uid: bigint;
  offset: number;
  length: number;
}

/** Builds a syntax map blob; `declared` lets tests lie about the token count. */
export function buildSyntaxMap(tokens: RawToken[], declared = tokens.length): Uint8Array {
  const buffer = Buffer.alloc(16 + tokens.length * 16);
  buffer.writeBigUInt64LE(BigInt(declared) << 4n, 8);
  tokens.forEach((token, index) => {
    const base = 16 + index * 16;
    buffer.writeBigUInt64LE(token.uid, base);
    buffer.writeUInt32LE(token.offset, base + 8);
    buffer.writeUInt32LE(token.length * 2, base + 12);
  });
  return new Uint8Array(buffer);
}

export async function captureError(run: () => Promise<unknown>): Promise<unknown> {
  try {
    await run();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to fail.");
}

export interface RecordedRequest {
  request: string | undefined;
  sourceFile?: string;
  sourceText?: string;
  offset?: number;
  compilerArgs?: string[];
}

function recordRequest(request: DictionaryValue, names: Map<bigint, string>): RecordedRequest {
  const requestUid = request.entries.get(Keys.request);
  const args = request.entries.get(Keys.compilerArgs);
  return {
    request: requestUid?.type === "uint64" ? names.get(requestUid.value) : undefined,
    sourceFile: getString(request, Keys.sourceFile),
    sourceText: getString(request, Keys.sourceText),
    offset: getInteger(request, Keys.offset),
    compilerArgs:
      args?.type === "array"
        ? args.items.flatMap((item) => (item.type === "string" ? [item.value] : []))
        : undefined,
  };
}

/** In-process stand-in for sourcekitd; replies come from `respond`. */
export class FakeSourceKitService implements SourceKitService {
  public readonly requests: RecordedRequest[] = [];
  public readonly stringForUid = createLookup();
  public initialized = false;
  public stopped = false;
  private readonly respond: (request: RecordedRequest) => ResponseValue;

  public constructor(respond: (request: RecordedRequest) => ResponseValue) {
    this.respond = respond;
  }

  public async initialize(): Promise<void> {
    this.initialized = true;
  }

  public async uidForString(name: string): Promise<bigint> {
    for (const [uid, candidate] of NAMES) {
      if (candidate === name) {
        return uid;
      }
    }
    throw new Error(`No UID for ${name}`);
  }

  public async sendRequest(request: DictionaryValue): Promise<ResponseValue> {
    const recorded = recordRequest(request, NAMES);
    this.requests.push(recorded);
    return this.respond(recorded);
  }

  public async shutdown(): Promise<void> {
    this.stopped = true;
  }
}
