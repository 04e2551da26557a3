import { ChangeDetector } from './navigation/changeDetector.js';
import { resolvePanelConfig } from './navigation/config.js';
import { EVENT_LOG_LIMIT } from './navigation/defaults.js';
import { DisplayFormatter } from './navigation/displayFormatter.js';
import { formatPathForDisplay } from './navigation/pathUtils.js';
import { DebounceScheduler, type ScheduledTask } from './navigation/scheduler.js';
import { StackManager, type IngestResult } from './navigation/stackManager.js';
import type {
  EditorHost,
  NavigationSource,
  PanelConfig,
  RenderResult,
  StackSnapshot,
  TriggerKind,
} from './navigation/types.js';

export type PanelSubscriber = {
  write(chunk: string): unknown;
  end(): unknown;
};

export type EventLogEntry = {
  event: TriggerKind;
  relativeMs: number;
  timestamp: number;
};

export type StackSummary = {
  id: string;
  name: string;
  rootPath: string;
  rootLine: number;
  depth: number;
  currentIndex: number;
  active: boolean;
};

export type NavigationHistoryOptions = {
  source: NavigationSource;
  host: EditorHost;
  config: PanelConfig;
  workspaceRoot: string;
  now?: () => number;
};

function toSseDataLine(result: RenderResult): string {
  return `data: ${JSON.stringify(result)}\n\n`;
}

export class NavigationHistory {
  private readonly source: NavigationSource;
  private readonly workspaceRoot: string;
  private readonly now: () => number;
  private readonly detector = new ChangeDetector();
  private readonly formatter = new DisplayFormatter();
  private readonly scheduler: DebounceScheduler;
  private readonly manager: StackManager;
  private readonly subscribers = new Set<PanelSubscriber>();
  private readonly events: EventLogEntry[] = [];
  private lastEventAt = 0;
  private config: PanelConfig;

  constructor(options: NavigationHistoryOptions) {
    this.source = options.source;
    this.workspaceRoot = options.workspaceRoot;
    this.now = options.now ?? Date.now;
    this.config = options.config;
    this.scheduler = new DebounceScheduler({
      onError: (error) => {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(`navigation pass failed: ${message}`);
      },
    });
    this.manager = new StackManager({
      host: options.host,
      source: options.source,
      onChange: () => this.formatter.invalidate(),
    });
  }

  get panelConfig(): PanelConfig {
    return this.config;
  }

  notify(trigger: TriggerKind): ScheduledTask {
    this.logEvent(trigger);
    const delay = trigger === 'jump' ? this.config.fastDebounceMs : this.config.debounceMs;
    return this.scheduler.schedule(delay, () => {
      this.processNow();
    });
  }

  hasPendingPass(): boolean {
    return this.scheduler.hasPending();
  }

  processNow(): IngestResult | null {
    const polled = this.detector.poll(this.source);
    if (!polled.changed) {
      if (polled.error) this.debug(`navigation stack unreadable: ${polled.error}`);
      return null;
    }

    const { snapshot } = polled;
    this.debug(`pass: curidx=${snapshot.currentIndex} items=${snapshot.items.length}`);
    const result = this.manager.ingest(snapshot);

    if (result.kind === 'created' || result.kind === 'rerooted') {
      // the new stack is filled from this same snapshot on the follow-up pass
      this.detector.reset();
      this.scheduler.schedule(this.config.fastDebounceMs, () => {
        this.processNow();
      });
    } else if (result.kind === 'skipped') {
      this.detector.reset();
    }

    this.broadcast();
    return result;
  }

  render(): RenderResult {
    return this.formatter.render(this.manager.collection(), this.config);
  }

  hasHistory(): boolean {
    if (this.manager.hasHistory()) return true;
    const snapshot = this.peekSnapshot();
    return snapshot !== null && snapshot.items.length > 0;
  }

  newStack(): string | null {
    const id = this.manager.createStack();
    this.broadcast();
    return id;
  }

  switchNext(): void {
    this.manager.switchNext();
    this.broadcast();
  }

  switchPrev(): void {
    this.manager.switchPrev();
    this.broadcast();
  }

  clear(activeOnly = true): void {
    this.scheduler.cancel();
    this.manager.clear(activeOnly);
    this.detector.reset();
    this.broadcast();
  }

  updateConfig(patch: unknown): PanelConfig {
    this.config = resolvePanelConfig(patch, this.config);
    this.formatter.invalidate();
    this.broadcast();
    return this.config;
  }

  listStacks(): StackSummary[] {
    const { order, stacks, activeId } = this.manager.collection();
    const out: StackSummary[] = [];
    for (const id of order) {
      const stack = stacks.get(id);
      if (!stack) continue;
      out.push({
        id,
        name: stack.displayName,
        rootPath: formatPathForDisplay(this.workspaceRoot, stack.rootLocation.fileId, this.config.pathDisplayMode),
        rootLine: stack.rootLocation.line,
        depth: stack.displayItems.length,
        currentIndex: stack.currentIndex,
        active: id === activeId,
      });
    }
    return out;
  }

  describeActive(): string[] {
    return this.manager.describeActive();
  }

  eventLog(): EventLogEntry[] {
    return this.events.map((entry) => ({ ...entry }));
  }

  clearEventLog(): void {
    this.events.length = 0;
    this.lastEventAt = 0;
  }

  subscribe(subscriber: PanelSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  dispose(): void {
    this.scheduler.cancel();
    for (const subscriber of this.subscribers) {
      try {
        subscriber.end();
      } catch (error) {
        this.debug(`closing subscriber failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    this.subscribers.clear();
  }

  private broadcast(): void {
    if (this.subscribers.size === 0) return;
    const payload = toSseDataLine(this.render());
    for (const subscriber of this.subscribers) {
      try {
        subscriber.write(payload);
      } catch {
        this.subscribers.delete(subscriber);
      }
    }
  }

  private peekSnapshot(): StackSnapshot | null {
    try {
      return this.source.pollNavigationStack();
    } catch (error) {
      this.debug(`navigation stack unreadable: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  private logEvent(event: TriggerKind): void {
    if (!this.config.debug) return;
    const now = this.now();
    const relativeMs = this.lastEventAt > 0 ? Math.floor(now - this.lastEventAt) : 0;
    this.events.push({ event, relativeMs, timestamp: now });
    this.lastEventAt = now;
    if (this.events.length > EVENT_LOG_LIMIT) this.events.shift();
  }

  private debug(message: string): void {
    if (!this.config.debug) return;
    // eslint-disable-next-line no-console
    console.debug(`[nav] ${message}`);
  }
}
