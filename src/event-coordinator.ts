/**
 * How a raised update reaches the sessions that are subscribed when it is
 * raised.
 *
 * - `"broadcast"`: every subscription keeps the update generation it last
 *   saw, so each session observes each update on its own.
 * - `"first-reader"`: one shared `update-pending` flag. Whichever session
 *   observes it first clears it for everybody else.
 */
export type DeliveryMode = "broadcast" | "first-reader";

export interface WakeObservation {
  updateDue: boolean;
  shutdownDue: boolean;
}

export interface CoordinatorSnapshot {
  mode: DeliveryMode;
  wakeupPending: boolean;
  updatePending: boolean;
  shuttingDown: boolean;
  subscribers: number;
}

/** The per-session view of the coordinator held by one streaming session. */
export interface Subscription {
  readonly closed: boolean;
  /**
   * Resolves once a wakeup is pending for this subscription, or once the
   * subscription is closed. Consumes nothing.
   */
  waitForWakeup(): Promise<void>;
  /**
   * Reads and acknowledges the pending state for this subscription. A reported
   * update is cleared; the wakeup is cleared once nothing remains pending.
   * Call it while holding the guard.
   */
  observeAndClear(): WakeObservation;
  close(): void;
}

export interface EventCoordinatorOptions {
  mode?: DeliveryMode;
}

interface Cursor {
  seenGeneration: number;
  closed: boolean;
  wake: (() => void) | undefined;
}

/**
 * Shared update/shutdown/wakeup state between the signal bridge (one producer)
 * and the streaming sessions (many consumers).
 *
 * Raising an update or a shutdown is synchronous and never waits, so it can
 * run straight from a signal listener. Every waiter checks its wakeup flag in
 * the same synchronous step in which it parks, which leaves no window for a
 * lost wakeup.
 */
export class EventCoordinator {
  readonly mode: DeliveryMode;

  /** The shared flags are only kept in `"first-reader"` mode. */
  private wakeupPending = false;
  private updatePending = false;
  private shuttingDown = false;
  private generation = 0;
  private readonly cursors = new Set<Cursor>();
  private guardTail: Promise<void> = Promise.resolve();

  constructor(options: EventCoordinatorOptions = {}) {
    this.mode = options.mode ?? "broadcast";
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  requestUpdate(): void {
    if (this.mode === "first-reader") {
      this.updatePending = true;
      this.wakeupPending = true;
    }
    this.generation += 1;
    this.wakeAll();
  }

  requestShutdown(): void {
    this.shuttingDown = true;
    if (this.mode === "first-reader") {
      this.wakeupPending = true;
    }
    this.wakeAll();
  }

  subscribe(): Subscription {
    const cursor: Cursor = {
      seenGeneration: this.generation,
      closed: false,
      wake: undefined,
    };
    this.cursors.add(cursor);

    return {
      get closed() {
        return cursor.closed;
      },
      waitForWakeup: () => this.waitFor(cursor),
      observeAndClear: () => this.observe(cursor),
      close: () => this.release(cursor),
    };
  }

  /**
   * Runs `task` while holding the guard. Tasks run one at a time, in the order
   * they asked for it. A failing task releases the guard and rejects only its
   * own caller.
   */
  withGuard<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.guardTail.then(task);
    this.guardTail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  snapshot(): CoordinatorSnapshot {
    return {
      mode: this.mode,
      wakeupPending:
        this.mode === "first-reader"
          ? this.wakeupPending
          : this.shuttingDown || this.anyCursorBehind(),
      updatePending:
        this.mode === "first-reader"
          ? this.updatePending
          : this.anyCursorBehind(),
      shuttingDown: this.shuttingDown,
      subscribers: this.cursors.size,
    };
  }

  private isWakeupPending(cursor: Cursor): boolean {
    if (this.mode === "first-reader") {
      return this.wakeupPending;
    }
    return this.shuttingDown || cursor.seenGeneration !== this.generation;
  }

  private waitFor(cursor: Cursor): Promise<void> {
    if (cursor.closed || this.isWakeupPending(cursor)) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      cursor.wake = resolve;
    });
  }

  private observe(cursor: Cursor): WakeObservation {
    const shutdownDue = this.shuttingDown;

    if (this.mode === "first-reader") {
      const updateDue = this.updatePending;
      this.updatePending = false;
      if (!shutdownDue) {
        this.wakeupPending = false;
      }
      return { updateDue, shutdownDue };
    }

    const updateDue = cursor.seenGeneration !== this.generation;
    cursor.seenGeneration = this.generation;
    return { updateDue, shutdownDue };
  }

  private release(cursor: Cursor): void {
    if (cursor.closed) {
      return;
    }
    cursor.closed = true;
    this.cursors.delete(cursor);
    this.wake(cursor);
  }

  private wakeAll(): void {
    for (const cursor of this.cursors) {
      this.wake(cursor);
    }
  }

  private wake(cursor: Cursor): void {
    const wake = cursor.wake;
    cursor.wake = undefined;
    wake?.();
  }

  private anyCursorBehind(): boolean {
    for (const cursor of this.cursors) {
      if (cursor.seenGeneration !== this.generation) {
        return true;
      }
    }
    return false;
  }
}
