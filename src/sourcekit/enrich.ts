import { SourceKitError } from "./errors.js";
import { COMMENT_MARK_KIND, DECLARATION_KIND_PREFIX, Keys } from "./keys.js";
import {
  getInteger,
  stringValue,
  type DictionaryValue,
  type ResponseValue,
} from "./responseValue.js";
import { FileSourceTextProvider, type SourceTextProvider } from "./sourceText.js";
import type { UidResolver } from "./uidResolver.js";

/**
 * Secondary request issued while walking a response. The walker moves the
 * offset slot to each declaration it meets and sends the query right there.
 */
export interface SupplementaryQuery {
  readonly sourceFile: string | undefined;
  setOffset(offset: number): void;
  send(): Promise<ResponseValue | undefined>;
}

export interface EnrichOptions {
  supplementary?: SupplementaryQuery;
  sourceText?: SourceTextProvider;
}

interface WalkContext {
  resolver: UidResolver;
  supplementary: SupplementaryQuery | undefined;
  sourceText: SourceTextProvider;
}

/**
 * Replaces every resolvable UID in `tree` with its name, in place. With a
 * supplementary query, declarations also receive the keys of a cursor-info
 * reply and `// MARK:` comments receive their source text as `key.name`.
 */
export async function enrichResponse(
  tree: DictionaryValue,
  resolver: UidResolver,
  options: EnrichOptions = {},
): Promise<void> {
  await enrichDictionary(tree, {
    resolver,
    supplementary: options.supplementary,
    sourceText: options.sourceText ?? new FileSourceTextProvider(),
  });
}

async function enrichValue(value: ResponseValue, context: WalkContext): Promise<void> {
  if (value.type === "dictionary") {
    await enrichDictionary(value, context);
  } else if (value.type === "array") {
    for (const item of value.items) {
      await enrichValue(item, context);
    }
  }
}

async function enrichDictionary(dictionary: DictionaryValue, context: WalkContext): Promise<void> {
  // Keys added by a merge below are not visited in this pass.
  const keys = [...dictionary.entries.keys()];

  for (const key of keys) {
    const value = dictionary.entries.get(key);
    if (!value) {
      continue;
    }

    if (value.type !== "uint64") {
      await enrichValue(value, context);
      continue;
    }

    const name = await context.resolver.resolve(value.value);
    if (name === undefined) {
      continue;
    }
    dictionary.entries.set(key, stringValue(name));

    if (!context.supplementary || key !== Keys.kind) {
      continue;
    }
    if (name.startsWith(DECLARATION_KIND_PREFIX)) {
      await mergeDeclarationInfo(dictionary, context.supplementary);
    } else if (name === COMMENT_MARK_KIND) {
      await attachMarkText(dictionary, context.supplementary, context.sourceText);
    }
  }
}

async function mergeDeclarationInfo(
  dictionary: DictionaryValue,
  supplementary: SupplementaryQuery,
): Promise<void> {
  const nameOffset = getInteger(dictionary, Keys.nameOffset);
  if (nameOffset === undefined || nameOffset < 0) {
    return;
  }

  supplementary.setOffset(nameOffset);
  const reply = await supplementary.send();
  if (reply?.type !== "dictionary") {
    return;
  }

  for (const [key, value] of reply.entries) {
    // editor.open reports kinds more accurately than cursorinfo does.
    if (key === Keys.kind) {
      continue;
    }
    dictionary.entries.set(key, value);
  }
}

async function attachMarkText(
  dictionary: DictionaryValue,
  supplementary: SupplementaryQuery,
  sourceText: SourceTextProvider,
): Promise<void> {
  const offset = getInteger(dictionary, Keys.offset);
  const length = getInteger(dictionary, Keys.length);
  const filePath = supplementary.sourceFile;

  if (offset === undefined || length === undefined || filePath === undefined) {
    throw new SourceKitError(
      "source_read_failure",
      "Mark comment is missing its offset, length or source file.",
      { offset, length, filePath },
    );
  }

  const text = await sourceText.readRange(filePath, offset, length);
  dictionary.entries.set(Keys.name, stringValue(text));
}
