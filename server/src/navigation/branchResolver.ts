import type { NavigationEvent, NavigationStack } from './types.js';

export type BranchOutcome = 'extend' | 'branch' | 'backtrack' | 'unchanged';

// Returns the first 0-based position below `depth` where the two paths disagree, or -1.
function firstDivergence(items: readonly NavigationEvent[], displayItems: readonly NavigationEvent[], depth: number): number {
  for (let i = 0; i < depth; i++) {
    const live = items[i];
    const shown = displayItems[i];
    if (!live || !shown) {
      if (live || shown) return i;
      continue;
    }
    if (live.tagToken !== shown.tagToken) return i;
  }
  return -1;
}

export function updatePersistentHistory(
  stack: NavigationStack,
  items: readonly NavigationEvent[],
  index: number,
): BranchOutcome {
  let outcome: BranchOutcome = 'unchanged';

  if (index > stack.maxDepth) {
    for (let i = stack.maxDepth; i < index; i++) {
      const item = items[i];
      if (item) stack.displayItems[i] = item;
    }
    stack.maxDepth = index;
    outcome = 'extend';
  } else if (index <= stack.displayItems.length) {
    if (firstDivergence(items, stack.displayItems, index) !== -1) {
      stack.displayItems = items.slice(0, index);
      stack.maxDepth = index;
      outcome = 'branch';
    } else if (index < stack.displayItems.length) {
      outcome = 'backtrack';
    }
  }

  for (let i = 0; i < index; i++) {
    const item = items[i];
    if (item && !stack.displayItems[i]) stack.displayItems[i] = item;
  }

  stack.items = items;
  stack.currentIndex = index;
  return outcome;
}
