import type { DictionaryValue, ResponseValue } from "./responseValue.js";

/**
 * Synchronous request/response access to sourcekitd. Callers await every call
 * before issuing the next one, so requests reach the service in program order.
 */
export interface SourceKitService {
  initialize(): Promise<void>;
  uidForString(name: string): Promise<bigint>;
  stringForUid(uid: bigint): Promise<string | undefined>;
  sendRequest(request: DictionaryValue): Promise<ResponseValue>;
  shutdown(): Promise<void>;
}
