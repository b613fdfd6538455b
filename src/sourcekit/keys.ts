/** UIDs handed out by sourcekitd are always above this value. */
export const UID_THRESHOLD = 4_300_000_000n;

export const Keys = {
  request: "key.request",
  name: "key.name",
  sourceFile: "key.sourcefile",
  sourceText: "key.sourcetext",
  compilerArgs: "key.compilerargs",
  offset: "key.offset",
  length: "key.length",
  kind: "key.kind",
  nameOffset: "key.nameoffset",
  syntaxMap: "key.syntaxmap",
} as const;

export const RequestKinds = {
  editorOpen: "source.request.editor.open",
  cursorInfo: "source.request.cursorinfo",
} as const;

export const DECLARATION_KIND_PREFIX = "source.lang.swift.decl.";
export const COMMENT_MARK_KIND = "source.lang.swift.syntaxtype.comment.mark";
export const IDENTIFIER_KIND = "source.lang.swift.syntaxtype.identifier";
