import { SourceKitError } from "../sourcekit/errors.js";
import {
  arrayValue,
  boolValue,
  dataValue,
  dictionaryValue,
  doubleValue,
  int64Value,
  nullValue,
  stringValue,
  uint64Value,
  type ResponseValue,
} from "../sourcekit/responseValue.js";

/**
 * JSON has no 64-bit integers or byte strings, so those travel tagged:
 * `{"int64":"-1"}`, `{"uint64":"4300000001"}`, `{"double":1.5}`,
 * `{"data":"<base64>"}` and `{"dictionary":[["key", value], ...]}`.
 * Null, booleans, strings and arrays are sent as themselves.
 */
export type WireValue =
  | null
  | boolean
  | string
  | WireValue[]
  | { int64: string }
  | { uint64: string }
  | { double: number }
  | { data: string }
  | { dictionary: Array<[string, WireValue]> };

const MAX_UINT64 = (1n << 64n) - 1n;
const MIN_INT64 = -(1n << 63n);
const MAX_INT64 = (1n << 63n) - 1n;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/u;

function protocolError(path: string, message: string): SourceKitError {
  return new SourceKitError("bridge_protocol_error", `Invalid wire value at ${path}: ${message}`, {
    path,
  });
}

function parseInteger(raw: unknown, path: string, signed: boolean): bigint {
  if (typeof raw !== "string" || !(signed ? /^-?\d+$/u : /^\d+$/u).test(raw)) {
    throw protocolError(path, `expected a decimal string, got ${JSON.stringify(raw)}`);
  }
  const value = BigInt(raw);
  const [min, max] = signed ? [MIN_INT64, MAX_INT64] : [0n, MAX_UINT64];
  if (value < min || value > max) {
    throw protocolError(path, `${raw} does not fit in ${signed ? "int64" : "uint64"}`);
  }
  return value;
}

function decodeTagged(raw: Record<string, unknown>, path: string): ResponseValue {
  const keys = Object.keys(raw);
  if (keys.length !== 1) {
    throw protocolError(path, `tagged value needs exactly one tag, got [${keys.join(", ")}]`);
  }

  if ("int64" in raw) {
    return int64Value(parseInteger(raw.int64, `${path}.int64`, true));
  }
  if ("uint64" in raw) {
    return uint64Value(parseInteger(raw.uint64, `${path}.uint64`, false));
  }
  if ("double" in raw) {
    if (typeof raw.double !== "number") {
      throw protocolError(`${path}.double`, "expected a number");
    }
    return doubleValue(raw.double);
  }
  if ("data" in raw) {
    if (typeof raw.data !== "string" || !BASE64_PATTERN.test(raw.data)) {
      throw protocolError(`${path}.data`, "expected a base64 string");
    }
    return dataValue(new Uint8Array(Buffer.from(raw.data, "base64")));
  }
  if ("dictionary" in raw) {
    return decodeDictionary(raw.dictionary, `${path}.dictionary`);
  }
  throw protocolError(path, `unknown tag "${keys[0]}"`);
}

function decodeDictionary(raw: unknown, path: string): ResponseValue {
  if (!Array.isArray(raw)) {
    throw protocolError(path, "expected an array of [key, value] pairs");
  }

  const dictionary = dictionaryValue();
  raw.forEach((pair: unknown, index) => {
    const pairPath = `${path}[${index}]`;
    if (!Array.isArray(pair) || pair.length !== 2 || typeof pair[0] !== "string") {
      throw protocolError(pairPath, "expected a [string, value] pair");
    }
    const key: string = pair[0];
    if (dictionary.entries.has(key)) {
      throw protocolError(pairPath, `duplicate key "${key}"`);
    }
    dictionary.entries.set(key, decodeWireValue(pair[1], `${pairPath}[1]`));
  });
  return dictionary;
}

export function decodeWireValue(raw: unknown, path = "$"): ResponseValue {
  if (raw === null) {
    return nullValue();
  }
  if (typeof raw === "boolean") {
    return boolValue(raw);
  }
  if (typeof raw === "string") {
    return stringValue(raw);
  }
  if (typeof raw === "number") {
    throw protocolError(path, "bare numbers are not allowed; tag them as int64, uint64 or double");
  }
  if (Array.isArray(raw)) {
    return arrayValue(raw.map((item: unknown, index) => decodeWireValue(item, `${path}[${index}]`)));
  }
  if (typeof raw === "object") {
    return decodeTagged({ ...raw }, path);
  }
  throw protocolError(path, `unsupported JSON type ${typeof raw}`);
}

export function encodeWireValue(value: ResponseValue): WireValue {
  switch (value.type) {
    case "null":
      return null;
    case "bool":
    case "string":
      return value.value;
    case "int64":
      return { int64: value.value.toString() };
    case "uint64":
      return { uint64: value.value.toString() };
    case "double":
      return { double: value.value };
    case "data":
      return { data: Buffer.from(value.value).toString("base64") };
    case "array":
      return value.items.map((item) => encodeWireValue(item));
    case "dictionary":
      return {
        dictionary: [...value.entries].map(([key, item]): [string, WireValue] => [
          key,
          encodeWireValue(item),
        ]),
      };
  }
}
