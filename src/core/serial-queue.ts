/**
 * Serialization point for session state.
 *
 * Tasks run synchronously in submission order. A task submitted while
 * another is running (a timer callback or a sink re-entering the session)
 * waits until the running one and everything queued before it finish.
 */

export type Task = () => void;

export class SerialQueue {
  private readonly tasks: Task[] = [];
  private draining = false;

  constructor(private readonly log: (message: string) => void = (m) => console.error(m)) {}

  get busy(): boolean {
    return this.draining;
  }

  run(task: Task): void {
    this.tasks.push(task);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.tasks.shift();
      while (next) {
        try {
          next();
        } catch (error) {
          const msg = error instanceof Error ? error.message : String(error);
          this.log(`[queue] task failed: ${msg}`);
        }
        next = this.tasks.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}
