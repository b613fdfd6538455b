import { UID_THRESHOLD } from "./keys.js";

export type UidLookup = (uid: bigint) => Promise<string | undefined>;

/**
 * Memoizing map from sourcekitd UIDs to their names.
 *
 * Only names that were found are cached; a lookup that comes back empty is
 * asked again next time. The cache is never invalidated, so one resolver
 * should live as long as the service connection it was built for.
 */
export class UidResolver {
  private readonly lookup: UidLookup;
  private readonly names = new Map<bigint, string>();

  public constructor(lookup: UidLookup) {
    this.lookup = lookup;
  }

  public get size(): number {
    return this.names.size;
  }

  public has(uid: bigint): boolean {
    return this.names.has(uid);
  }

  public async resolve(uid: bigint): Promise<string | undefined> {
    if (uid < UID_THRESHOLD) {
      return undefined;
    }

    const cached = this.names.get(uid);
    if (cached !== undefined) {
      return cached;
    }

    const name = await this.lookup(uid);
    if (name === undefined) {
      return undefined;
    }
    this.names.set(uid, name);
    return name;
  }
}
