/**
 * Line protocol spoken with the sourcekitd helper process. Each line on the
 * helper's stdin is one request; each line on its stdout is one response.
 */

export type BridgeCommand =
  | "initialize"
  | "uid.get_string"
  | "uid.get_from_string"
  | "request.send"
  | "shutdown";

export interface BridgeRequest {
  seq: number;
  command: BridgeCommand;
  arguments?: Record<string, unknown>;
}

export interface BridgeResponse {
  seq: number;
  success: boolean;
  message?: string;
  body?: unknown;
}

// Command-specific bodies

export interface UidStringBody {
  name: string | null;
}

export interface UidFromStringBody {
  uid: string;
}

export interface RequestSendBody {
  response: unknown;
}
