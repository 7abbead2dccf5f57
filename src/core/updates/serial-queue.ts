/**
 * Serial Event Queue
 *
 * Single logical control thread for the coordinator: daemon events and
 * caller commands are posted here and run one at a time, in order. A task
 * posted while another runs (e.g. a listener calling back into the
 * coordinator) waits until the running task returns. `onIdle` runs inside
 * the drain, so work it triggers is queued the same way.
 */

export type QueueTask = () => void;

export class SerialQueue {
  private readonly tasks: QueueTask[] = [];
  private draining = false;

  constructor(
    private readonly onTaskError: (error: unknown) => void,
    private readonly onIdle?: () => void
  ) {}

  get isDraining(): boolean {
    return this.draining;
  }

  post(task: QueueTask): void {
    this.tasks.push(task);
    if (!this.draining) {
      this.drain();
    }
  }

  private drain(): void {
    this.draining = true;
    try {
      // Tasks posted from onIdle run before the queue reports idle again
      do {
        this.runPending();
        this.onIdle?.();
      } while (this.tasks.length > 0);
    } finally {
      this.draining = false;
    }
  }

  private runPending(): void {
    let task = this.tasks.shift();
    while (task) {
      try {
        task();
      } catch (error) {
        this.onTaskError(error);
      }
      task = this.tasks.shift();
    }
  }
}
