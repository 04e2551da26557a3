import type { PanelConfig, TriggerKind } from './types.js';

export const DEFAULT_PANEL_CONFIG: PanelConfig = {
  maxDepth: 20,
  debounceMs: 50,
  fastDebounceMs: 10,
  pathDisplayMode: 'relative',
  showArity: true,
  showModulePath: true,
  debug: false,
};

export const MAX_DEBOUNCE_MS = 1000;
export const EVENT_LOG_LIMIT = 50;

export const TRIGGER_KINDS: readonly TriggerKind[] = ['jump', 'buffer-enter', 'window-enter', 'cursor-hold', 'file-open'];

export const PANEL_HEADER = '📁 Tag Stacks:';
export const NO_STACKS_LINE = '  (no stacks)';
export const ACTIVE_MARKER = '▶';
export const CONNECTOR_LINE = '  ↓';
export const CURRENT_SUFFIX = ' ← [current]';
export const TRUNCATED_LINE = '  ... (truncated)';
export const HIGHLIGHT_GROUP = 'String';
export const UNKNOWN_NAME = 'Unknown';
