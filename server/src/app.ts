import cors from 'cors';
import express from 'express';

import { TRIGGER_KINDS } from './navigation/defaults.js';
import type { PushedNavigationSource, WorkspaceEditorHost } from './navigation/hosts.js';
import type { FileLocation, NavigationEvent, StackSnapshot, TriggerKind } from './navigation/types.js';
import type { NavigationHistory } from './navigationHistory.js';

export type AppContext = {
  history: NavigationHistory;
  source: PushedNavigationSource;
  host: WorkspaceEditorHost;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseTrigger(value: unknown): TriggerKind {
  const trigger = TRIGGER_KINDS.find((kind) => kind === value);
  if (!trigger) throw new Error(`Unknown event=${String(value)}`);
  return trigger;
}

function parseLocation(value: unknown): FileLocation | null {
  if (!isRecord(value)) return null;
  const fileId = typeof value.fileId === 'string' ? value.fileId.trim() : '';
  if (!fileId) return null;
  const line = typeof value.line === 'number' && Number.isFinite(value.line) ? Math.max(1, Math.floor(value.line)) : 1;
  return { fileId, line };
}

function parseEvent(value: unknown, position: number): NavigationEvent {
  if (!isRecord(value)) throw new Error(`snapshot.items[${position}] must be an object`);
  const tagToken = typeof value.tagToken === 'string' ? value.tagToken : '';
  return { tagToken, originLocation: parseLocation(value.originLocation) };
}

export function parseSnapshot(value: unknown): StackSnapshot {
  if (!isRecord(value)) throw new Error('snapshot must be an object');
  if (!Array.isArray(value.items)) throw new Error('snapshot.items must be an array');
  const currentIndex = value.currentIndex;
  if (typeof currentIndex !== 'number' || !Number.isInteger(currentIndex) || currentIndex < 0) {
    throw new Error(`snapshot.currentIndex must be a non-negative integer (got ${String(currentIndex)})`);
  }
  const items = value.items.map((item: unknown, i: number) => parseEvent(item, i));
  return { items, currentIndex };
}

export function createApp(ctx: AppContext): express.Express {
  const { history, source, host } = ctx;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.post('/api/editor/events', (req, res) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) throw new Error('request body must be an object');
      const trigger = parseTrigger(body.event);

      if (isRecord(body.file)) {
        const filePath = typeof body.file.path === 'string' && body.file.path.trim() ? body.file.path.trim() : null;
        const line = typeof body.file.line === 'number' ? body.file.line : 1;
        host.setCursor(filePath, line);
      }
      if (body.snapshot !== undefined) source.update(parseSnapshot(body.snapshot));

      history.notify(trigger);
      res.json({ ok: true });
    } catch (error) {
      res.status(400).json({ ok: false, error: errorMessage(error) });
    }
  });

  app.get('/api/panel', (_req, res) => {
    const { lines, highlights } = history.render();
    res.json({ ok: true, lines, highlights });
  });

  app.get('/api/panel/events', (req, res) => {
    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const unsubscribe = history.subscribe(res);
    res.write(`data: ${JSON.stringify(history.render())}\n\n`);

    const ping = setInterval(() => {
      res.write(': ping\n\n');
    }, 15_000);
    ping.unref();

    req.on('close', () => {
      clearInterval(ping);
      unsubscribe();
    });
  });

  app.get('/api/history', (_req, res) => {
    res.json({ ok: true, hasHistory: history.hasHistory() });
  });

  app.get('/api/stacks', (_req, res) => {
    res.json({ ok: true, stacks: history.listStacks() });
  });

  app.post('/api/stacks/new', (_req, res) => {
    const stackId = history.newStack();
    if (!stackId) {
      res.status(404).json({ ok: false, error: 'No readable file is open in the editor' });
      return;
    }
    res.json({ ok: true, stackId });
  });

  app.post('/api/stacks/next', (_req, res) => {
    history.switchNext();
    res.json({ ok: true, stacks: history.listStacks() });
  });

  app.post('/api/stacks/prev', (_req, res) => {
    history.switchPrev();
    res.json({ ok: true, stacks: history.listStacks() });
  });

  app.post('/api/stacks/clear', (req, res) => {
    const body: unknown = req.body;
    const activeOnly = !(isRecord(body) && body.all === true);
    history.clear(activeOnly);
    res.json({ ok: true });
  });

  app.get('/api/config', (_req, res) => {
    res.json({ ok: true, config: history.panelConfig });
  });

  app.post('/api/config', (req, res) => {
    try {
      const config = history.updateConfig(req.body);
      res.json({ ok: true, config });
    } catch (error) {
      res.status(400).json({ ok: false, error: errorMessage(error) });
    }
  });

  app.get('/api/debug/state', (_req, res) => {
    res.json({ ok: true, lines: history.describeActive() });
  });

  app.get('/api/debug/events', (_req, res) => {
    res.json({ ok: true, enabled: history.panelConfig.debug, events: history.eventLog() });
  });

  app.delete('/api/debug/events', (_req, res) => {
    history.clearEventLog();
    res.json({ ok: true });
  });

  return app;
}
