export type ScheduledTask = {
  readonly id: number;
  readonly pending: boolean;
  cancel(): void;
};

export type DebounceSchedulerOptions = {
  onError?: (error: unknown) => void;
};

function logTaskError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  // eslint-disable-next-line no-console
  console.error(`Scheduled pass failed: ${message}`);
}

class PendingTask implements ScheduledTask {
  private handle: ReturnType<typeof setTimeout> | null;

  constructor(
    readonly id: number,
    delayMs: number,
    run: () => void,
  ) {
    this.handle = setTimeout(() => {
      this.handle = null;
      run();
    }, delayMs);
  }

  get pending(): boolean {
    return this.handle !== null;
  }

  cancel(): void {
    if (this.handle === null) return;
    clearTimeout(this.handle);
    this.handle = null;
  }
}

export class DebounceScheduler {
  private current: PendingTask | null = null;
  private nextId = 1;

  constructor(private readonly options: DebounceSchedulerOptions = {}) {}

  schedule(delayMs: number, run: () => void): ScheduledTask {
    this.cancel();
    const id = this.nextId;
    this.nextId += 1;
    const task = new PendingTask(id, Math.max(0, delayMs), () => {
      if (this.current?.id === id) this.current = null;
      try {
        run();
      } catch (error) {
        (this.options.onError ?? logTaskError)(error);
      }
    });
    this.current = task;
    return task;
  }

  hasPending(): boolean {
    return this.current?.pending ?? false;
  }

  cancel(): void {
    this.current?.cancel();
    this.current = null;
  }
}
