import { findDocumentedTokenOffsets } from "./documentedOffsets.js";
import { enrichResponse } from "./enrich.js";
import { SourceKitError } from "./errors.js";
import { Keys } from "./keys.js";
import { swiftFilesFromArguments } from "./language.js";
import { CursorInfoQuery, editorOpenRequest, type SourceInput } from "./requests.js";
import type { DictionaryValue, ResponseValue } from "./responseValue.js";
import type { SourceKitService } from "./service.js";
import { FileSourceTextProvider, type SourceTextProvider } from "./sourceText.js";
import { decodeSyntaxMap, identifierOffsets, type SyntaxToken } from "./syntaxMap.js";
import { UidResolver } from "./uidResolver.js";

export interface FileDocs {
  file: string;
  response: DictionaryValue;
}

export interface PipelineOptions {
  resolver?: UidResolver;
  sourceText?: SourceTextProvider;
}

function expectDictionary(value: ResponseValue, request: string): DictionaryValue {
  if (value.type !== "dictionary") {
    throw new SourceKitError(
      "bridge_protocol_error",
      `Expected a dictionary reply to ${request}, got ${value.type}.`,
      { request, type: value.type },
    );
  }
  return value;
}

function syntaxMapBytes(response: DictionaryValue): Uint8Array {
  const syntaxMap = response.entries.get(Keys.syntaxMap);
  if (syntaxMap?.type !== "data") {
    throw new SourceKitError(
      "malformed_binary_payload",
      `Response has no binary ${Keys.syntaxMap}.`,
      { found: syntaxMap?.type ?? "missing" },
    );
  }
  return syntaxMap.value;
}

export class SourceKitPipeline {
  private readonly service: SourceKitService;
  private readonly resolver: UidResolver;
  private readonly sourceText: SourceTextProvider;

  public constructor(service: SourceKitService, options: PipelineOptions = {}) {
    this.service = service;
    this.resolver = options.resolver ?? new UidResolver((uid) => service.stringForUid(uid));
    this.sourceText = options.sourceText ?? new FileSourceTextProvider();
  }

  public async structure(file: string): Promise<DictionaryValue> {
    const response = await this.open({ file });
    response.entries.delete(Keys.syntaxMap);
    await enrichResponse(response, this.resolver, { sourceText: this.sourceText });
    return response;
  }

  public async syntax(source: SourceInput): Promise<SyntaxToken[]> {
    const response = await this.open(source);
    return decodeSyntaxMap(syntaxMapBytes(response), this.resolver);
  }

  public async docs(compilerArgs: readonly string[]): Promise<FileDocs[]> {
    const files = swiftFilesFromArguments(compilerArgs);
    const cursorInfo = await CursorInfoQuery.create(this.service, compilerArgs);
    const results: FileDocs[] = [];

    for (const file of files) {
      cursorInfo.setSourceFile(file);
      const response = await this.open({ file });
      response.entries.delete(Keys.syntaxMap);
      await enrichResponse(response, this.resolver, {
        supplementary: cursorInfo,
        sourceText: this.sourceText,
      });
      results.push({ file, response });
    }

    return results;
  }

  public async documentedTokenOffsets(file: string): Promise<number[]> {
    const response = await this.open({ file });
    const offsets = await identifierOffsets(syntaxMapBytes(response), this.resolver);
    const text = await this.sourceText.readAll(file);
    return findDocumentedTokenOffsets(text, offsets);
  }

  private async open(source: SourceInput): Promise<DictionaryValue> {
    const request = await editorOpenRequest(this.service, source);
    const reply = await this.service.sendRequest(request);
    return expectDictionary(reply, "editor.open");
  }
}
