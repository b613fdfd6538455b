const SWIFT_EXTENSION = ".swift";

export function isSwiftSource(filePath: string): boolean {
  return filePath.endsWith(SWIFT_EXTENSION);
}

/** Picks the Swift sources out of a compiler argument list, keeping their order. */
export function swiftFilesFromArguments(args: readonly string[]): string[] {
  return args.filter((arg) => isSwiftSource(arg));
}
