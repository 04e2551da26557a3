import fs from 'node:fs';
import path from 'node:path';

import type { EditorHost, NavigationSource, StackSnapshot } from './types.js';

const EMPTY_SNAPSHOT: StackSnapshot = { items: [], currentIndex: 1 };
const MISSING_DIR_CODES = new Set(['ENOENT', 'ENOTDIR', 'EACCES']);

export class PushedNavigationSource implements NavigationSource {
  private snapshot: StackSnapshot = EMPTY_SNAPSHOT;

  update(snapshot: StackSnapshot): void {
    this.snapshot = { items: [...snapshot.items], currentIndex: snapshot.currentIndex };
  }

  pollNavigationStack(): StackSnapshot {
    return this.snapshot;
  }

  resetNavigationStack(): void {
    this.snapshot = EMPTY_SNAPSHOT;
  }
}

export class WorkspaceEditorHost implements EditorHost {
  private filePath: string | null = null;
  private cursorLine = 1;

  constructor(private readonly workspaceRoot: string) {}

  setCursor(filePath: string | null, line = 1): void {
    this.filePath = filePath ? path.resolve(this.workspaceRoot, filePath) : null;
    this.cursorLine = Number.isFinite(line) ? Math.max(1, Math.floor(line)) : 1;
  }

  currentFilePath(): string | null {
    return this.filePath;
  }

  currentCursorLine(): number {
    return this.cursorLine;
  }

  directoryListing(dirPath: string): string[] {
    try {
      return fs.readdirSync(path.resolve(this.workspaceRoot, dirPath));
    } catch (error) {
      const code = error && typeof error === 'object' && 'code' in error ? error.code : undefined;
      if (typeof code === 'string' && MISSING_DIR_CODES.has(code)) return [];
      throw error;
    }
  }
}
