import type { NavigationSource, StackSnapshot } from './types.js';

type SnapshotSummary = {
  currentIndex: number;
  count: number;
  firstTag: string | null;
  lastTag: string | null;
};

export type PollResult = { changed: true; snapshot: StackSnapshot } | { changed: false; error?: string };

function summarize(snapshot: StackSnapshot): SnapshotSummary {
  const count = snapshot.items.length;
  return {
    currentIndex: snapshot.currentIndex,
    count,
    firstTag: snapshot.items[0]?.tagToken ?? null,
    lastTag: snapshot.items[count - 1]?.tagToken ?? null,
  };
}

function sameSummary(a: SnapshotSummary, b: SnapshotSummary): boolean {
  return a.currentIndex === b.currentIndex && a.count === b.count && a.firstTag === b.firstTag && a.lastTag === b.lastTag;
}

// Only index, length and end tags are compared; a mid-stack edit of equal length goes unnoticed.
export class ChangeDetector {
  private last: SnapshotSummary | null = null;

  observe(snapshot: StackSnapshot): boolean {
    const next = summarize(snapshot);
    const previous = this.last;
    this.last = next;
    if (!previous) return true;
    return !sameSummary(previous, next);
  }

  poll(source: NavigationSource): PollResult {
    let snapshot: StackSnapshot;
    try {
      snapshot = source.pollNavigationStack();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { changed: false, error: message };
    }
    return this.observe(snapshot) ? { changed: true, snapshot } : { changed: false };
  }

  reset(): void {
    this.last = null;
  }
}
