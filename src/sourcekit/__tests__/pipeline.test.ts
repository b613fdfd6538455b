import { describe, expect, it } from "vitest";
import { SourceKitPipeline } from "../pipeline.js";
import {
  arrayValue,
  dataValue,
  dictionaryValue,
  int64Value,
  stringValue,
  uint64Value,
} from "../responseValue.js";
import { toJson } from "../serialize.js";
import { InMemorySourceTextProvider } from "../sourceText.js";
import { FakeSourceKitService, UIDS, buildSyntaxMap, captureError, type RecordedRequest } from "./helpers.js";

const EDITOR_OPEN = "source.request.editor.open";
const CURSOR_INFO = "source.request.cursorinfo";

function openReply(request: RecordedRequest) {
  if (request.sourceFile === "/work/B.swift") {
    return dictionaryValue({
      "key.substructure": arrayValue([
        dictionaryValue({
          "key.kind": uint64Value(UIDS.commentMark),
          "key.offset": int64Value(0),
          "key.length": int64Value(14),
        }),
      ]),
    });
  }
  return dictionaryValue({
    "key.offset": int64Value(0),
    "key.length": int64Value(12),
    "key.syntaxmap": dataValue(buildSyntaxMap([{ uid: UIDS.keyword, offset: 0, length: 4 }])),
    "key.substructure": arrayValue([
      dictionaryValue({
        "key.kind": uint64Value(UIDS.declFunctionFree),
        "key.nameoffset": int64Value(5),
        "key.name": stringValue("f"),
      }),
    ]),
  });
}

function respond(request: RecordedRequest) {
  if (request.request === CURSOR_INFO) {
    return dictionaryValue({
      "key.kind": stringValue("source.lang.swift.ref.function.free"),
      "key.typename": stringValue("() -> ()"),
    });
  }
  return openReply(request);
}

describe("SourceKitPipeline", () => {
  it("builds a structure document without cursor info", async () => {
    const service = new FakeSourceKitService(respond);

    const structure = await new SourceKitPipeline(service).structure("/work/A.swift");

    expect(JSON.parse(toJson(structure))).toEqual({
      "key.offset": 0,
      "key.length": 12,
      "key.substructure": [
        {
          "key.kind": "source.lang.swift.decl.function.free",
          "key.nameoffset": 5,
          "key.name": "f",
        },
      ],
    });
    expect(service.requests.map((request) => request.request)).toEqual([EDITOR_OPEN]);
  });

  it("decodes syntax tokens for inline text", async () => {
    const service = new FakeSourceKitService(() =>
      dictionaryValue({
        "key.syntaxmap": dataValue(
          buildSyntaxMap([
            { uid: UIDS.keyword, offset: 0, length: 3 },
            { uid: UIDS.identifier, offset: 4, length: 1 },
          ]),
        ),
      }),
    );

    const tokens = await new SourceKitPipeline(service).syntax({ text: "let x = 1" });

    expect(tokens).toEqual([
      { kind: "source.lang.swift.syntaxtype.keyword", offset: 0, length: 3 },
      { kind: "source.lang.swift.syntaxtype.identifier", offset: 4, length: 1 },
    ]);
    expect(service.requests[0]).toMatchObject({ request: EDITOR_OPEN, sourceText: "let x = 1" });
  });

  it("fails syntax requests whose reply has no syntax map", async () => {
    const service = new FakeSourceKitService(() => dictionaryValue({ "key.offset": int64Value(0) }));

    const error = await captureError(() => new SourceKitPipeline(service).syntax({ file: "/work/A.swift" }));

    expect(error).toMatchObject({ code: "malformed_binary_payload", details: { found: "missing" } });
  });

  it("rejects editor.open replies that are not dictionaries", async () => {
    const service = new FakeSourceKitService(() => arrayValue());

    const error = await captureError(() => new SourceKitPipeline(service).structure("/work/A.swift"));

    expect(error).toMatchObject({ code: "bridge_protocol_error" });
  });

  it("documents every Swift file with cursor info and mark names", async () => {
    const service = new FakeSourceKitService(respond);
    const sourceText = new InMemorySourceTextProvider({
      "/work/B.swift": "// MARK: Setup\nfunc g() {}",
    });
    const compilerArgs = ["-module-name", "Demo", "/work/A.swift", "/work/B.swift"];

    const docs = await new SourceKitPipeline(service, { sourceText }).docs(compilerArgs);

    expect(service.requests.map((request) => [request.request, request.sourceFile, request.offset])).toEqual([
      [EDITOR_OPEN, "/work/A.swift", undefined],
      [CURSOR_INFO, "/work/A.swift", 5],
      [EDITOR_OPEN, "/work/B.swift", undefined],
    ]);
    expect(service.requests[1]?.compilerArgs).toEqual(compilerArgs);
    expect(docs.map((entry) => entry.file)).toEqual(["/work/A.swift", "/work/B.swift"]);
    expect(JSON.parse(toJson(docs[0]?.response ?? dictionaryValue()))).toEqual({
      "key.offset": 0,
      "key.length": 12,
      "key.substructure": [
        {
          "key.kind": "source.lang.swift.decl.function.free",
          "key.nameoffset": 5,
          "key.name": "f",
          "key.typename": "() -> ()",
        },
      ],
    });
    expect(JSON.parse(toJson(docs[1]?.response ?? dictionaryValue()))).toEqual({
      "key.substructure": [
        {
          "key.kind": "source.lang.swift.syntaxtype.comment.mark",
          "key.offset": 0,
          "key.length": 14,
          "key.name": "// MARK: Setup",
        },
      ],
    });
  });

  it("shares one UID cache across requests", async () => {
    const service = new FakeSourceKitService(respond);
    const pipeline = new SourceKitPipeline(service);

    await pipeline.structure("/work/A.swift");
    await pipeline.structure("/work/A.swift");

    expect(service.stringForUid).toHaveBeenCalledTimes(1);
  });

  it("finds the identifiers that follow doc comments", async () => {
    const service = new FakeSourceKitService(() =>
      dictionaryValue({
        "key.syntaxmap": dataValue(
          buildSyntaxMap([
            { uid: UIDS.docComment, offset: 0, length: 8 },
            { uid: UIDS.keyword, offset: 8, length: 4 },
            { uid: UIDS.identifier, offset: 13, length: 1 },
          ]),
        ),
      }),
    );
    const sourceText = new InMemorySourceTextProvider({
      "/work/Doc.swift": "/// Doc\nfunc f() {}\n",
    });

    const offsets = await new SourceKitPipeline(service, { sourceText }).documentedTokenOffsets(
      "/work/Doc.swift",
    );

    expect(offsets).toEqual([13]);
  });
});
