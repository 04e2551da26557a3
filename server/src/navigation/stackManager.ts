import path from 'node:path';

import { updatePersistentHistory, type BranchOutcome } from './branchResolver.js';
import { inferModuleName } from './symbolNames.js';
import type {
  EditorHost,
  FileLocation,
  NavigationEvent,
  NavigationSource,
  NavigationStack,
  StackCollection,
  StackSnapshot,
} from './types.js';

export type IngestResult =
  | { kind: 'created'; stackId: string }
  | { kind: 'skipped' }
  | { kind: 'root' }
  | { kind: 'rerooted'; stackId: string }
  | { kind: 'updated'; outcome: BranchOutcome };

export type StackManagerOptions = {
  host: EditorHost;
  source: NavigationSource;
  onChange?: () => void;
};

function sameOrigin(a: NavigationEvent, b: NavigationEvent): boolean {
  return (a.originLocation?.fileId ?? null) === (b.originLocation?.fileId ?? null);
}

function resetHistory(stack: NavigationStack): void {
  stack.items = [];
  stack.displayItems = [];
  stack.currentIndex = 0;
  stack.maxDepth = 0;
  stack.atRoot = true;
}

export class StackManager {
  private readonly stacks = new Map<string, NavigationStack>();
  private readonly order: string[] = [];
  private activeId: string | null = null;
  private nextId = 1;

  constructor(private readonly options: StackManagerOptions) {}

  collection(): StackCollection {
    return { order: this.order, stacks: this.stacks, activeId: this.activeId };
  }

  activeStack(): NavigationStack | null {
    return this.activeId ? (this.stacks.get(this.activeId) ?? null) : null;
  }

  hasHistory(): boolean {
    for (const stack of this.stacks.values()) {
      if (stack.displayItems.length > 0) return true;
    }
    return false;
  }

  // Null when the root file is not in its directory listing.
  createStack(rootLocation?: FileLocation): string | null {
    const root = rootLocation ?? this.currentLocation();
    if (!root || !this.isReadable(root.fileId)) return null;

    const id = `stack_${this.nextId}`;
    this.nextId += 1;

    this.stacks.set(id, {
      id,
      displayName: inferModuleName(root.fileId),
      rootLocation: { ...root },
      items: [],
      displayItems: [],
      currentIndex: 0,
      maxDepth: 0,
      atRoot: true,
    });
    this.order.push(id);
    this.activeId = id;
    this.changed();
    return id;
  }

  switchNext(): void {
    this.rotate(1);
  }

  switchPrev(): void {
    this.rotate(-1);
  }

  // Empties history in place; stack ids and names survive.
  clear(activeOnly = true): void {
    if (activeOnly) {
      const active = this.activeStack();
      if (active) resetHistory(active);
    } else {
      for (const stack of this.stacks.values()) resetHistory(stack);
    }
    this.options.source.resetNavigationStack();
    this.changed();
  }

  ingest(snapshot: StackSnapshot): IngestResult {
    const active = this.activeStack();
    if (!active) {
      const stackId = this.createStack();
      return stackId ? { kind: 'created', stackId } : { kind: 'skipped' };
    }

    const items = snapshot.items;
    const index = Math.min(Math.max(0, Math.floor(snapshot.currentIndex) - 1), items.length);

    if (index === 0 || items.length === 0) {
      active.atRoot = true;
      active.items = items;
      active.currentIndex = 0;
      this.changed();
      return { kind: 'root' };
    }

    if (active.atRoot) {
      const next = items[0];
      const previous = active.items[0];
      if (next && previous && (next.tagToken !== previous.tagToken || !sameOrigin(next, previous))) {
        const stackId = (next.originLocation ? this.createStack(next.originLocation) : null) ?? this.createStack();
        if (stackId) return { kind: 'rerooted', stackId };
        return { kind: 'skipped' };
      }
      active.atRoot = false;
    }

    const outcome = updatePersistentHistory(active, items, index);
    this.changed();
    return { kind: 'updated', outcome };
  }

  describeActive(): string[] {
    const stack = this.activeStack();
    if (!stack) return ['No active stack'];
    const lines = [
      '=== Stack State ===',
      `Current idx: ${stack.currentIndex}`,
      `Max depth: ${stack.maxDepth}`,
      `Editor items: ${stack.items.length}`,
      `Display items: ${stack.displayItems.length}`,
    ];
    stack.displayItems.forEach((item, i) => {
      const marker = i + 1 === stack.currentIndex ? ' ← [current]' : '';
      lines.push(`  ${i + 1}. ${item.tagToken || 'unknown'}${marker}`);
    });
    return lines;
  }

  private rotate(step: 1 | -1): void {
    if (this.order.length <= 1) return;
    const current = this.activeId ? this.order.indexOf(this.activeId) : -1;
    const from = current === -1 ? 0 : current;
    const nextIndex = (from + step + this.order.length) % this.order.length;
    this.activeId = this.order[nextIndex] ?? this.activeId;
    this.changed();
  }

  private currentLocation(): FileLocation | null {
    const fileId = this.options.host.currentFilePath();
    if (!fileId) return null;
    return { fileId, line: this.options.host.currentCursorLine() };
  }

  private isReadable(filePath: string): boolean {
    if (!filePath) return false;
    try {
      return this.options.host.directoryListing(path.dirname(filePath)).includes(path.basename(filePath));
    } catch (error) {
      // eslint-disable-next-line no-console
      console.warn(`Cannot list ${path.dirname(filePath)}: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  private changed(): void {
    this.options.onChange?.();
  }
}
