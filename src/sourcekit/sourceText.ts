import fs from "node:fs/promises";
import { SourceKitError } from "./errors.js";

export interface SourceTextProvider {
  /** Returns the UTF-8 text in `[offset, offset + length)` of the file's bytes. */
  readRange(filePath: string, offset: number, length: number): Promise<string>;
  readAll(filePath: string): Promise<string>;
}

function isContinuationByte(bytes: Buffer, index: number): boolean {
  const byte = bytes[index];
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

function sliceBytes(filePath: string, bytes: Buffer, offset: number, length: number): string {
  if (
    !Number.isInteger(offset)
    || !Number.isInteger(length)
    || offset < 0
    || length < 0
    || offset + length > bytes.byteLength
  ) {
    throw new SourceKitError(
      "source_read_failure",
      `Byte range ${offset}+${length} is outside "${filePath}" (${bytes.byteLength} bytes).`,
      { filePath, offset, length, byteLength: bytes.byteLength },
    );
  }
  const end = offset + length;
  if (isContinuationByte(bytes, offset) || isContinuationByte(bytes, end)) {
    throw new SourceKitError(
      "source_read_failure",
      `Byte range ${offset}+${length} of "${filePath}" splits a UTF-8 character.`,
      { filePath, offset, length },
    );
  }
  return bytes.subarray(offset, end).toString("utf8");
}

export class FileSourceTextProvider implements SourceTextProvider {
  public async readRange(filePath: string, offset: number, length: number): Promise<string> {
    const bytes = await this.readBytes(filePath);
    return sliceBytes(filePath, bytes, offset, length);
  }

  public async readAll(filePath: string): Promise<string> {
    const bytes = await this.readBytes(filePath);
    return bytes.toString("utf8");
  }

  private async readBytes(filePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const errno = error instanceof Error && "code" in error ? error.code : undefined;
      throw new SourceKitError("source_read_failure", `Could not read "${filePath}": ${message}`, {
        filePath,
        errno,
      });
    }
  }
}

export class InMemorySourceTextProvider implements SourceTextProvider {
  private readonly files: Map<string, Buffer>;

  public constructor(files: Record<string, string>) {
    this.files = new Map(
      Object.entries(files).map(([filePath, text]) => [filePath, Buffer.from(text, "utf8")]),
    );
  }

  public async readRange(filePath: string, offset: number, length: number): Promise<string> {
    return sliceBytes(filePath, this.get(filePath), offset, length);
  }

  public async readAll(filePath: string): Promise<string> {
    return this.get(filePath).toString("utf8");
  }

  private get(filePath: string): Buffer {
    const bytes = this.files.get(filePath);
    if (!bytes) {
      throw new SourceKitError("source_read_failure", `No source text for "${filePath}".`, {
        filePath,
      });
    }
    return bytes;
  }
}
