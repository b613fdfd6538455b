export function clipText(input: string, maxChars: number): string {
  if (input.length <= maxChars) {
    return input;
  }
  return `${input.slice(0, maxChars)}...[truncated ${input.length - maxChars} chars]`;
}

/** Splits a whitespace separated argument string, honouring backslash-escaped spaces. */
export function splitArguments(input: string): string[] {
  const placeholder = "\u0000";
  return input
    .replace(/\\ /gu, placeholder)
    .split(/\s+/u)
    .filter((part) => part.length > 0)
    .map((part) => part.split(placeholder).join(" "));
}
