export type FileLocation = {
  fileId: string; // file path as reported by the editor
  line: number; // 1-based
};

export type NavigationEvent = {
  readonly tagToken: string;
  readonly originLocation: FileLocation | null;
};

export type StackSnapshot = {
  items: readonly NavigationEvent[];
  currentIndex: number; // 1-based, as the editor reports it
};

export type NavigationStack = {
  id: string;
  displayName: string;
  rootLocation: FileLocation;
  items: readonly NavigationEvent[];
  displayItems: NavigationEvent[];
  currentIndex: number; // 0-based, 0 = root
  maxDepth: number;
  atRoot: boolean;
};

export type StackCollection = {
  order: readonly string[];
  stacks: ReadonlyMap<string, NavigationStack>;
  activeId: string | null;
};

export type PathDisplayMode = 'relative' | 'absolute' | 'filename';

export type PanelConfig = {
  maxDepth: number;
  debounceMs: number;
  fastDebounceMs: number;
  pathDisplayMode: PathDisplayMode;
  showArity: boolean;
  showModulePath: boolean;
  debug: boolean;
};

export type HighlightSpan = {
  group: string;
  line: number; // 0-based
  colStart: number;
  colEnd: number; // byte offset, exclusive
};

export type RenderResult = {
  lines: string[];
  highlights: HighlightSpan[];
};

export interface NavigationSource {
  pollNavigationStack(): StackSnapshot;
  resetNavigationStack(): void;
}

export interface EditorHost {
  currentFilePath(): string | null;
  currentCursorLine(): number;
  directoryListing(dirPath: string): string[];
}

export type TriggerKind = 'jump' | 'buffer-enter' | 'window-enter' | 'cursor-hold' | 'file-open';
