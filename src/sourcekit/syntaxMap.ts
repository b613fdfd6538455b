import { SourceKitError } from "./errors.js";
import { IDENTIFIER_KIND } from "./keys.js";
import type { UidResolver } from "./uidResolver.js";

export interface SyntaxToken {
  kind: string;
  /** Byte offset into the source text. */
  offset: number;
  /** Length in bytes. */
  length: number;
}

const HEADER_SIZE = 16;
const RECORD_SIZE = 16;

interface RawRecord {
  uid: bigint;
  offset: number;
  length: number;
}

/**
 * Layout (little-endian): a 16-byte header whose second u64 is the token
 * count shifted left by 4, then one 16-byte record per token holding the
 * kind UID (u64), the start offset (u32) and the length shifted left by 1 (u32).
 */
function readRecords(bytes: Uint8Array): RawRecord[] {
  if (bytes.byteLength < HEADER_SIZE) {
    throw new SourceKitError(
      "malformed_binary_payload",
      `Syntax map is ${bytes.byteLength} bytes, shorter than its ${HEADER_SIZE}-byte header.`,
      { byteLength: bytes.byteLength },
    );
  }

  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const declared = buffer.readBigUInt64LE(8) >> 4n;
  const required = BigInt(HEADER_SIZE) + declared * BigInt(RECORD_SIZE);
  if (required > BigInt(buffer.byteLength)) {
    throw new SourceKitError(
      "malformed_binary_payload",
      `Syntax map declares ${declared} tokens but only has room for ${Math.floor((buffer.byteLength - HEADER_SIZE) / RECORD_SIZE)}.`,
      { declaredTokens: declared.toString(), byteLength: buffer.byteLength },
    );
  }

  const count = Number(declared);
  const records: RawRecord[] = [];
  for (let index = 0; index < count; index += 1) {
    const base = HEADER_SIZE + index * RECORD_SIZE;
    records.push({
      uid: buffer.readBigUInt64LE(base),
      offset: buffer.readUInt32LE(base + 8),
      length: buffer.readUInt32LE(base + 12) >>> 1,
    });
  }
  return records;
}

async function resolveKind(resolver: UidResolver, uid: bigint, index: number): Promise<string> {
  const kind = await resolver.resolve(uid);
  if (kind === undefined) {
    throw new SourceKitError(
      "unresolvable_required_identifier",
      `Syntax token ${index} has kind UID ${uid} with no name.`,
      { uid: uid.toString(), tokenIndex: index },
    );
  }
  return kind;
}

export async function decodeSyntaxMap(
  bytes: Uint8Array,
  resolver: UidResolver,
): Promise<SyntaxToken[]> {
  const records = readRecords(bytes);
  const tokens: SyntaxToken[] = [];
  for (const [index, record] of records.entries()) {
    const kind = await resolveKind(resolver, record.uid, index);
    tokens.push({ kind, offset: record.offset, length: record.length });
  }
  return tokens;
}

/** Start offsets of identifier tokens, in stream order. */
export async function identifierOffsets(
  bytes: Uint8Array,
  resolver: UidResolver,
): Promise<number[]> {
  const records = readRecords(bytes);
  const offsets: number[] = [];
  for (const [index, record] of records.entries()) {
    const kind = await resolveKind(resolver, record.uid, index);
    if (kind === IDENTIFIER_KIND) {
      offsets.push(record.offset);
    }
  }
  return offsets;
}
