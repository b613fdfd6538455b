import { SourceKitError } from "./errors.js";
import {
  arrayValue,
  dictionaryValue,
  int64Value,
  stringValue,
  type ResponseValue,
} from "./responseValue.js";
import type { SyntaxToken } from "./syntaxMap.js";

const INDENT = "  ";

function render(value: ResponseValue, depth: number, path: string): string {
  switch (value.type) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "int64":
    case "uint64":
      return value.value.toString();
    case "double":
      if (!Number.isFinite(value.value)) {
        throw new SourceKitError(
          "serialization_contract_violation",
          `Non-finite number at ${path} cannot be written as JSON.`,
          { path, value: String(value.value) },
        );
      }
      return JSON.stringify(value.value);
    case "string":
      return JSON.stringify(value.value);
    case "data":
      throw new SourceKitError(
        "serialization_contract_violation",
        `Undecoded binary data at ${path}; strip or decode it before serializing.`,
        { path, byteLength: value.value.byteLength },
      );
    case "array": {
      if (value.items.length === 0) {
        return "[]";
      }
      const inner = INDENT.repeat(depth + 1);
      const lines = value.items.map(
        (item, index) => `${inner}${render(item, depth + 1, `${path}[${index}]`)}`,
      );
      return `[\n${lines.join(",\n")}\n${INDENT.repeat(depth)}]`;
    }
    case "dictionary": {
      if (value.entries.size === 0) {
        return "{}";
      }
      const inner = INDENT.repeat(depth + 1);
      const lines = [...value.entries].map(
        ([key, item]) =>
          `${inner}${JSON.stringify(key)}: ${render(item, depth + 1, `${path}.${key}`)}`,
      );
      return `{\n${lines.join(",\n")}\n${INDENT.repeat(depth)}}`;
    }
  }
}

/**
 * Pretty-prints a response tree. The layout matches `JSON.stringify(x, null, 2)`;
 * 64-bit integers are written digit for digit.
 */
export function toJson(value: ResponseValue): string {
  return render(value, 0, "$");
}

export function syntaxTokensToValue(tokens: readonly SyntaxToken[]): ResponseValue {
  return arrayValue(
    tokens.map((token) =>
      dictionaryValue([
        ["type", stringValue(token.kind)],
        ["offset", int64Value(token.offset)],
        ["length", int64Value(token.length)],
      ]),
    ),
  );
}
