import type { SupplementaryQuery } from "./enrich.js";
import { Keys, RequestKinds } from "./keys.js";
import {
  arrayValue,
  dictionaryValue,
  getString,
  int64Value,
  stringValue,
  uint64Value,
  type DictionaryValue,
  type ResponseValue,
} from "./responseValue.js";
import type { SourceKitService } from "./service.js";

export type SourceInput = { file: string } | { text: string };

export async function editorOpenRequest(
  service: SourceKitService,
  source: SourceInput,
): Promise<DictionaryValue> {
  const requestUid = await service.uidForString(RequestKinds.editorOpen);
  const request = dictionaryValue([
    [Keys.request, uint64Value(requestUid)],
    [Keys.name, stringValue("")],
  ]);
  if ("file" in source) {
    request.entries.set(Keys.sourceFile, stringValue(source.file));
  } else {
    request.entries.set(Keys.sourceText, stringValue(source.text));
  }
  return request;
}

/**
 * cursorinfo request template reused for every declaration of every file in a
 * docs run; only the source file and offset change between sends.
 */
export class CursorInfoQuery implements SupplementaryQuery {
  private readonly service: SourceKitService;
  private readonly template: DictionaryValue;

  private constructor(service: SourceKitService, template: DictionaryValue) {
    this.service = service;
    this.template = template;
  }

  public static async create(
    service: SourceKitService,
    compilerArgs: readonly string[],
  ): Promise<CursorInfoQuery> {
    const requestUid = await service.uidForString(RequestKinds.cursorInfo);
    const template = dictionaryValue([
      [Keys.request, uint64Value(requestUid)],
      [Keys.compilerArgs, arrayValue(compilerArgs.map((arg) => stringValue(arg)))],
    ]);
    return new CursorInfoQuery(service, template);
  }

  public get sourceFile(): string | undefined {
    return getString(this.template, Keys.sourceFile);
  }

  public get request(): DictionaryValue {
    return this.template;
  }

  public setSourceFile(filePath: string): void {
    this.template.entries.set(Keys.sourceFile, stringValue(filePath));
  }

  public setOffset(offset: number): void {
    this.template.entries.set(Keys.offset, int64Value(offset));
  }

  public async send(): Promise<ResponseValue | undefined> {
    const reply = await this.service.sendRequest(this.template);
    return reply.type === "dictionary" ? reply : undefined;
  }
}
