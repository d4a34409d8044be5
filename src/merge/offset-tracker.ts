/**
 * Running count of pages already appended to the merged output.  The
 * value read before an entry is recorded is that entry's first page.
 */
export class OffsetTracker {
  private total = 0;

  currentOffset(): number {
    return this.total;
  }

  /**
   * Advance by the page count of the entry just appended.  A zero-page
   * source leaves the offset where it is.
   */
  record(pageCount: number): void {
    if (!Number.isInteger(pageCount) || pageCount < 0) {
      throw new RangeError(`Page count must be a non-negative integer, got ${pageCount}`);
    }
    this.total += pageCount;
  }
}
