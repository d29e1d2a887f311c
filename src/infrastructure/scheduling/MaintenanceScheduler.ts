import { componentLogger } from "../logging/logger";

export interface MaintenanceTask {
  name: string;
  run: () => Promise<unknown>;
}

const log = componentLogger("MaintenanceScheduler");

/**
 * Runs periodic housekeeping. A tick never overlaps the previous one and a
 * failing task does not stop the others.
 */
export class MaintenanceScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private tasks: MaintenanceTask[],
    private intervalMs: number
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => log.error({ err: error }, "Maintenance tick failed"));
    }, this.intervalMs);
    this.timer.unref();
    log.info({ intervalMs: this.intervalMs, tasks: this.tasks.map((t) => t.name) }, "Maintenance scheduler started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async tick(): Promise<void> {
    if (this.running) return;
    this.running = true;
    try {
      for (const task of this.tasks) {
        try {
          await task.run();
        } catch (error) {
          log.error({ err: error, task: task.name }, "Maintenance task failed");
        }
      }
    } finally {
      this.running = false;
    }
  }
}
