export { AuditLogger } from "./audit/auditLogger.js";
export { BridgeService, type BridgeServiceOptions } from "./bridge/bridgeService.js";
export type { BridgeCommand, BridgeRequest, BridgeResponse } from "./bridge/protocol.js";
export {
  ChildProcessTransport,
  type BridgeTransport,
  type TransportHandlers,
} from "./bridge/transport.js";
export { decodeWireValue, encodeWireValue, type WireValue } from "./bridge/wireCodec.js";
export { loadRuntimeConfig } from "./config.js";
export { findDocumentedTokenOffsets } from "./sourcekit/documentedOffsets.js";
export { enrichResponse, type EnrichOptions, type SupplementaryQuery } from "./sourcekit/enrich.js";
export {
  SourceKitError,
  formatError,
  type SourceKitErrorCode,
} from "./sourcekit/errors.js";
export * from "./sourcekit/keys.js";
export { swiftFilesFromArguments } from "./sourcekit/language.js";
export { SourceKitPipeline, type FileDocs, type PipelineOptions } from "./sourcekit/pipeline.js";
export { CursorInfoQuery, editorOpenRequest, type SourceInput } from "./sourcekit/requests.js";
export * from "./sourcekit/responseValue.js";
export { syntaxTokensToValue, toJson } from "./sourcekit/serialize.js";
export type { SourceKitService } from "./sourcekit/service.js";
export {
  FileSourceTextProvider,
  InMemorySourceTextProvider,
  type SourceTextProvider,
} from "./sourcekit/sourceText.js";
export { decodeSyntaxMap, identifierOffsets, type SyntaxToken } from "./sourcekit/syntaxMap.js";
export { UidResolver, type UidLookup } from "./sourcekit/uidResolver.js";
export type { RuntimeConfig } from "./types.js";
