import {
  ACTIVE_MARKER,
  CONNECTOR_LINE,
  CURRENT_SUFFIX,
  HIGHLIGHT_GROUP,
  NO_STACKS_LINE,
  PANEL_HEADER,
  TRUNCATED_LINE,
} from './defaults.js';
import { applyNameOptions, inferModuleName, inferSymbolName } from './symbolNames.js';
import type { HighlightSpan, NavigationStack, PanelConfig, RenderResult, StackCollection } from './types.js';

class PanelBuilder {
  readonly lines: string[] = [];
  readonly highlights: HighlightSpan[] = [];

  push(line: string, highlighted = false): void {
    if (highlighted) {
      this.highlights.push({
        group: HIGHLIGHT_GROUP,
        line: this.lines.length,
        colStart: 0,
        colEnd: Buffer.byteLength(line, 'utf8'),
      });
    }
    this.lines.push(line);
  }

  result(): RenderResult {
    return { lines: this.lines, highlights: this.highlights };
  }
}

function renderStack(builder: PanelBuilder, stack: NavigationStack, isActive: boolean, config: PanelConfig): void {
  builder.push(`${isActive ? ACTIVE_MARKER : ' '} ${stack.displayName}`, isActive);

  const atRoot = isActive && stack.currentIndex === 0;
  const rootLine = `  ${inferModuleName(stack.rootLocation.fileId)} (root)`;
  builder.push(atRoot ? `${rootLine}${CURRENT_SUFFIX}` : rootLine, atRoot);

  for (let i = 1; i <= stack.displayItems.length; i++) {
    if (i > config.maxDepth) {
      builder.push(TRUNCATED_LINE);
      break;
    }
    const item = stack.displayItems[i - 1];
    if (!item) continue;

    builder.push(CONNECTOR_LINE);
    const name = applyNameOptions(inferSymbolName(item.tagToken, item.originLocation), config);
    const isCurrent = isActive && i === stack.currentIndex;
    builder.push(isCurrent ? `  ${name}${CURRENT_SUFFIX}` : `  ${name}`, isCurrent);
  }
}

export function renderPanel(collection: StackCollection, config: PanelConfig): RenderResult {
  const builder = new PanelBuilder();
  builder.push(PANEL_HEADER);

  const stacks = collection.order
    .map((id) => collection.stacks.get(id))
    .filter((stack): stack is NavigationStack => stack !== undefined);

  if (stacks.length === 0) {
    builder.push(NO_STACKS_LINE);
    return builder.result();
  }

  const multiple = stacks.length > 1;
  if (multiple) builder.push(`  (${stacks.length} stacks)`);

  for (const stack of stacks) {
    renderStack(builder, stack, stack.id === collection.activeId, config);
    if (multiple) builder.push('');
  }
  return builder.result();
}

export class DisplayFormatter {
  private cached: { config: PanelConfig; result: RenderResult } | null = null;

  render(collection: StackCollection, config: PanelConfig): RenderResult {
    if (this.cached && this.cached.config === config) return this.cached.result;
    const result = renderPanel(collection, config);
    this.cached = { config, result };
    return result;
  }

  invalidate(): void {
    this.cached = null;
  }
}
