/** Immutable set of integer tags backed by a sorted array. */
export class SortedTagSet {
  private readonly tags: number[];

  public constructor(tags: Iterable<number> = []) {
    this.tags = [...new Set(tags)].sort((a, b) => a - b);
  }

  public get size(): number {
    return this.tags.length;
  }

  public contains(tag: number): boolean {
    let lo = 0;
    let hi = this.tags.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const value = this.tags[mid];
      if (value === tag) {
        return true;
      }
      if (value < tag) {
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return false;
  }

  public toArray(): number[] {
    return [...this.tags];
  }
}

export const EMPTY_TAG_SET = new SortedTagSet();
