import path from 'node:path';

import type { PathDisplayMode } from './types.js';

export function toPosixPath(filePath: string): string {
  return filePath.replaceAll('\\', '/');
}

export function toWorkspaceRelativePath(workspaceRoot: string, filePath: string): string {
  const rel = path.relative(workspaceRoot, filePath);
  return toPosixPath(rel.length === 0 ? filePath : rel);
}

export function formatPathForDisplay(workspaceRoot: string, filePath: string, mode: PathDisplayMode): string {
  if (mode === 'filename') return path.posix.basename(toPosixPath(filePath));
  if (mode === 'absolute') return toPosixPath(path.resolve(workspaceRoot, filePath));
  return toWorkspaceRelativePath(workspaceRoot, path.resolve(workspaceRoot, filePath));
}
