export type SourceKitErrorCode =
  | "unresolvable_required_identifier"
  | "malformed_binary_payload"
  | "source_read_failure"
  | "serialization_contract_violation"
  | "bridge_unavailable"
  | "bridge_protocol_error"
  | "bridge_timeout"
  | "bridge_request_failed";

export type SourceKitErrorDetails = Record<string, unknown>;

export class SourceKitError extends Error {
  readonly code: SourceKitErrorCode;
  readonly details?: SourceKitErrorDetails;

  constructor(code: SourceKitErrorCode, message: string, details?: SourceKitErrorDetails) {
    super(message);
    this.name = "SourceKitError";
    this.code = code;
    this.details = details;
  }
}

export function formatError(error: unknown): string {
  if (error instanceof SourceKitError) {
    return `Error [${error.code}]: ${error.message}`;
  }
  if (error instanceof Error) {
    if (error.message.includes("ENOENT")) {
      return `Error: File or directory not found: ${error.message}`;
    }
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
