import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../errors.js";

export type TaskSettlement<T> =
  | { readonly id: string; readonly label: string; readonly status: "fulfilled"; readonly value: T; readonly durationMs: number }
  | { readonly id: string; readonly label: string; readonly status: "rejected"; readonly error: string; readonly durationMs: number };

export interface TaskHandle<T> {
  readonly id: string;
  /** Resolves once the task settles; never rejects. */
  readonly settled: Promise<TaskSettlement<T>>;
}

/**
 * Tracks work the caller does not wait for. Every task's settlement is
 * logged and handed to `onSettled`; `drain()` waits for all of them.
 */
export class BackgroundTasks {
  private readonly running = new Map<string, Promise<unknown>>();
  private idCounter = 0;
  private drainResolvers: Array<() => void> = [];

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.running.size;
  }

  spawn<T>(
    label: string,
    fn: () => Promise<T>,
    onSettled?: (settlement: TaskSettlement<T>) => void,
  ): TaskHandle<T> {
    const id = `bg-${++this.idCounter}`;
    const started = Date.now();

    const settled = Promise.resolve()
      .then(fn)
      .then(
        (value): TaskSettlement<T> => ({ id, label, status: "fulfilled", value, durationMs: Date.now() - started }),
        (err: unknown): TaskSettlement<T> => {
          this.logger.error({ err, taskId: id, label }, "Background task failed");
          return { id, label, status: "rejected", error: errorMessage(err), durationMs: Date.now() - started };
        },
      )
      .then((settlement) => {
        if (settlement.status === "fulfilled") {
          this.logger.debug({ taskId: id, label, durationMs: settlement.durationMs }, "Background task completed");
        }
        try {
          onSettled?.(settlement);
        } catch (err) {
          this.logger.error({ err, taskId: id }, "Background settlement observer threw");
        }
        return settlement;
      })
      .finally(() => {
        this.running.delete(id);
        this.checkDrain();
      });

    this.running.set(id, settled);
    return { id, settled };
  }

  /** Wait until every spawned task has settled. */
  async drain(): Promise<void> {
    if (this.running.size === 0) return;
    return new Promise<void>((resolve) => {
      this.drainResolvers.push(resolve);
    });
  }

  private checkDrain(): void {
    if (this.running.size === 0 && this.drainResolvers.length > 0) {
      const resolvers = this.drainResolvers;
      this.drainResolvers = [];
      for (const resolve of resolvers) resolve();
    }
  }
}
