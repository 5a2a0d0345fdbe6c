/**
 * Hands out unique anchor ids for headings.
 *
 * Keys are reserved for the lifetime of the allocator (one document); a
 * repeated heading gets `_2`, `_3`, ... appended.
 */
export class FragmentAllocator {
  private readonly used = new Set<string>();

  allocate(rawText: string): string {
    const key = FragmentAllocator.normalize(rawText);

    let candidate = key;
    let suffix = 2;
    while (this.used.has(candidate)) {
      candidate = `${key}_${suffix}`;
      suffix++;
    }

    this.used.add(candidate);
    return candidate;
  }

  has(key: string): boolean {
    return this.used.has(key);
  }

  size(): number {
    return this.used.size;
  }

  /**
   * Strip markup and double quotes, and turn whitespace runs into single
   * underscores.
   */
  static normalize(rawText: string): string {
    return rawText
      .replace(/<[^>]*>/g, '')
      .replace(/"/g, '')
      .trim()
      .replace(/\s+/g, '_');
  }
}
