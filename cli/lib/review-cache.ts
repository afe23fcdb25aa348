/**
 * Review Cache
 *
 * In-memory store of formatted review text, indexed by worktree path and
 * review-unit number. One instance lives for the whole process.
 *
 * All methods are synchronous, so no caller can observe a half-applied update.
 */
export class ReviewCache {
  private reviews = new Map<string, Map<number, string>>();

  get(worktreePath: string, unitNumber: number): string | undefined {
    return this.reviews.get(worktreePath)?.get(unitNumber);
  }

  /**
   * Store a review, replacing any previous text for the same key
   */
  set(worktreePath: string, unitNumber: number, review: string): void {
    let entries = this.reviews.get(worktreePath);
    if (!entries) {
      entries = new Map();
      this.reviews.set(worktreePath, entries);
    }
    entries.set(unitNumber, review);
  }

  remove(worktreePath: string, unitNumber: number): void {
    const entries = this.reviews.get(worktreePath);
    if (!entries) return;
    entries.delete(unitNumber);
    if (entries.size === 0) {
      this.reviews.delete(worktreePath);
    }
  }

  removeWorktree(worktreePath: string): void {
    this.reviews.delete(worktreePath);
  }

  /**
   * Copy of every review cached for a worktree (empty when none)
   */
  getAllForWorktree(worktreePath: string): Map<number, string> {
    return new Map(this.reviews.get(worktreePath));
  }

  /**
   * Worktree paths that currently hold at least one review
   */
  worktrees(): string[] {
    return [...this.reviews.keys()];
  }

  get size(): number {
    let count = 0;
    for (const entries of this.reviews.values()) {
      count += entries.size;
    }
    return count;
  }

  clear(): void {
    this.reviews = new Map();
  }
}
