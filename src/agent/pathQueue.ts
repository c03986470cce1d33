import type { Logger } from "pino";
import { comparablePath } from "../common/files";

export type Task = () => Promise<void>;

/**
 * Runs background work one task at a time per path. Tasks for different
 * paths run independently. A failing task is logged and does not stall the
 * tasks queued behind it.
 */
export class PathQueue {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly logger: Logger) {}

  enqueue(filePath: string, label: string, task: Task): void {
    const key = comparablePath(filePath);
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous
      .then(task)
      .catch((err: unknown) => {
        this.logger.error({ err, path: filePath, task: label }, "background task failed");
      })
      .finally(() => {
        if (this.tails.get(key) === next) {
          this.tails.delete(key);
        }
      });
    this.tails.set(key, next);
  }

  get size(): number {
    return this.tails.size;
  }

  /** Resolves once every task queued so far, and any queued meanwhile, has settled. */
  async idle(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(Array.from(this.tails.values()));
    }
  }
}
