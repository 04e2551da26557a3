import path from 'node:path';

import { DEFAULT_PANEL_CONFIG, MAX_DEBOUNCE_MS } from './defaults.js';
import { readJsonFile } from './io.js';
import type { PanelConfig, PathDisplayMode } from './types.js';

export type ServerConfig = {
  port: number;
  workspaceRoot: string;
  panel: PanelConfig;
};

const PATH_DISPLAY_MODES: readonly PathDisplayMode[] = ['relative', 'absolute', 'filename'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPathDisplayMode(value: unknown): value is PathDisplayMode {
  return typeof value === 'string' && PATH_DISPLAY_MODES.some((mode) => mode === value);
}

// Numbers and numeric strings; anything else is null.
function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim()) return Number(value);
  return null;
}

function resolveDelay(value: unknown, fallback: number, label: string): number {
  if (value === undefined || value === null) return fallback;
  const n = toNumber(value);
  if (n === null || !Number.isFinite(n) || n < 0 || n > MAX_DEBOUNCE_MS) {
    throw new Error(`${label} must be a number between 0 and ${MAX_DEBOUNCE_MS} (got ${String(value)})`);
  }
  return Math.floor(n);
}

export function resolvePanelConfig(input: unknown, base: PanelConfig = DEFAULT_PANEL_CONFIG): PanelConfig {
  const raw = isRecord(input) ? input : {};

  const depth = toNumber(raw.maxDepth);
  const maxDepth = depth !== null && Number.isFinite(depth) ? Math.max(1, Math.floor(depth)) : base.maxDepth;

  return {
    maxDepth,
    debounceMs: resolveDelay(raw.debounceMs, base.debounceMs, 'debounceMs'),
    fastDebounceMs: resolveDelay(raw.fastDebounceMs, base.fastDebounceMs, 'fastDebounceMs'),
    pathDisplayMode: isPathDisplayMode(raw.pathDisplayMode) ? raw.pathDisplayMode : base.pathDisplayMode,
    showArity: typeof raw.showArity === 'boolean' ? raw.showArity : base.showArity,
    showModulePath: typeof raw.showModulePath === 'boolean' ? raw.showModulePath : base.showModulePath,
    debug: typeof raw.debug === 'boolean' ? raw.debug : base.debug,
  };
}

export async function loadServerConfig(env: NodeJS.ProcessEnv = process.env): Promise<ServerConfig> {
  const port = Number(env.PORT ?? 3001);
  if (!Number.isInteger(port) || port < 0 || port > 65535) throw new Error(`Invalid PORT=${env.PORT ?? ''}`);

  const workspaceRoot = path.resolve(env.NAV_PANEL_WORKSPACE?.trim() || process.cwd());

  const configPath = env.NAV_PANEL_CONFIG?.trim();
  const fileConfig = configPath ? await readJsonFile(path.resolve(workspaceRoot, configPath)) : {};
  let panel = resolvePanelConfig(fileConfig);
  if (env.NAV_PANEL_DEBUG === '1' || env.NAV_PANEL_DEBUG === 'true') panel = { ...panel, debug: true };

  return { port, workspaceRoot, panel };
}
