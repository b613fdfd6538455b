export interface NullValue {
  type: "null";
}

export interface BoolValue {
  type: "bool";
  value: boolean;
}

export interface Int64Value {
  type: "int64";
  value: bigint;
}

export interface UInt64Value {
  type: "uint64";
  value: bigint;
}

export interface DoubleValue {
  type: "double";
  value: number;
}

export interface StringValue {
  type: "string";
  value: string;
}

export interface DataValue {
  type: "data";
  value: Uint8Array;
}

export interface ArrayValue {
  type: "array";
  items: ResponseValue[];
}

/** Keys are unique and keep the order they were first inserted in. */
export interface DictionaryValue {
  type: "dictionary";
  entries: Map<string, ResponseValue>;
}

export type ResponseValue =
  | NullValue
  | BoolValue
  | Int64Value
  | UInt64Value
  | DoubleValue
  | StringValue
  | DataValue
  | ArrayValue
  | DictionaryValue;

export const nullValue = (): NullValue => ({ type: "null" });

export const boolValue = (value: boolean): BoolValue => ({ type: "bool", value });

export const int64Value = (value: bigint | number): Int64Value => ({
  type: "int64",
  value: BigInt(value),
});

export const uint64Value = (value: bigint | number): UInt64Value => ({
  type: "uint64",
  value: BigInt(value),
});

export const doubleValue = (value: number): DoubleValue => ({ type: "double", value });

export const stringValue = (value: string): StringValue => ({ type: "string", value });

export const dataValue = (value: Uint8Array): DataValue => ({ type: "data", value });

export const arrayValue = (items: ResponseValue[] = []): ArrayValue => ({ type: "array", items });

export function dictionaryValue(
  entries: Array<readonly [string, ResponseValue]> | Record<string, ResponseValue> = [],
): DictionaryValue {
  const map = new Map<string, ResponseValue>();
  const pairs = Array.isArray(entries) ? entries : Object.entries(entries);
  for (const [key, value] of pairs) {
    map.set(key, value);
  }
  return { type: "dictionary", entries: map };
}

export function isDictionary(value: ResponseValue | undefined): value is DictionaryValue {
  return value?.type === "dictionary";
}

/**
 * Reads an integer field regardless of whether the service sent it signed or
 * unsigned. Values outside the safe JS integer range are treated as absent.
 */
export function getInteger(dictionary: DictionaryValue, key: string): number | undefined {
  const value = dictionary.entries.get(key);
  if (!value || (value.type !== "int64" && value.type !== "uint64")) {
    return undefined;
  }
  if (value.value > BigInt(Number.MAX_SAFE_INTEGER) || value.value < BigInt(Number.MIN_SAFE_INTEGER)) {
    return undefined;
  }
  return Number(value.value);
}

export function getString(dictionary: DictionaryValue, key: string): string | undefined {
  const value = dictionary.entries.get(key);
  return value?.type === "string" ? value.value : undefined;
}

export function cloneValue(value: ResponseValue): ResponseValue {
  switch (value.type) {
    case "null":
    case "bool":
    case "int64":
    case "uint64":
    case "double":
    case "string":
      return { ...value };
    case "data":
      return dataValue(value.value.slice());
    case "array":
      return arrayValue(value.items.map((item) => cloneValue(item)));
    case "dictionary":
      return dictionaryValue(
        [...value.entries].map(([key, item]) => [key, cloneValue(item)] as const),
      );
  }
}
