const DOC_COMMENT_PATTERN = /(\/\/\/.*\n|\*\/\n)/gu;

/**
 * Pairs every documentation comment with the first identifier that starts at
 * or after the end of the comment line. Offsets are UTF-8 byte offsets, as in
 * the syntax map.
 */
export function findDocumentedTokenOffsets(
  sourceText: string,
  identifierOffsets: readonly number[],
): number[] {
  const sorted = [...identifierOffsets].sort((a, b) => a - b);
  const documented: number[] = [];
  let cursor = 0;
  let previousEnd = 0;
  let endByte = 0;

  for (const match of sourceText.matchAll(DOC_COMMENT_PATTERN)) {
    const end = (match.index ?? 0) + match[0].length;
    endByte += Buffer.byteLength(sourceText.slice(previousEnd, end), "utf8");
    previousEnd = end;

    while (cursor < sorted.length && (sorted[cursor] ?? 0) < endByte) {
      cursor += 1;
    }
    const next = sorted[cursor];
    if (next === undefined) {
      break;
    }
    documented.push(next);
  }

  return documented;
}
