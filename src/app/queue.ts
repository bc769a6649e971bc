/**
 * Event Queue
 *
 * Single-consumer queue. Each event is handled to completion before the
 * next one starts; events pushed from inside the handler (or from I/O
 * callbacks) wait their turn.
 */

export interface EventQueueOptions<T> {
  /** Called once if the handler throws; the queue is closed afterwards */
  onError: (error: unknown, event: T) => void;
}

export class EventQueue<T extends { type: string }> {
  private readonly pending: T[] = [];
  private draining = false;
  private isClosed = false;

  constructor(
    private readonly handler: (event: T) => void,
    private readonly options: EventQueueOptions<T>
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  get size(): number {
    return this.pending.length;
  }

  push(event: T): void {
    if (this.isClosed) return;
    this.pending.push(event);
    if (this.draining) return;

    this.draining = true;
    try {
      this.drain();
    } finally {
      this.draining = false;
    }
  }

  /**
   * Stop accepting events and drop anything still queued.
   */
  close(): void {
    this.isClosed = true;
    this.pending.length = 0;
  }

  private drain(): void {
    let event = this.pending.shift();
    while (event !== undefined && !this.isClosed) {
      try {
        this.handler(event);
      } catch (error) {
        this.close();
        this.options.onError(error, event);
        return;
      }
      event = this.pending.shift();
    }
  }
}
