import { describeError } from './errors.js';
import type { QueueLogger } from './types.js';

export interface SchedulerTask {
  name: string;
  intervalMs: number;
  run: () => void | Promise<void>;
}

export class Scheduler {
  private readonly timerIds = new Map<string, NodeJS.Timeout>();

  constructor(private readonly logger: QueueLogger) {}

  register(task: SchedulerTask): void {
    if (this.timerIds.has(task.name)) {
      throw new Error(`Task already registered: ${task.name}`);
    }

    const timerId = setInterval(() => {
      void this.runTask(task);
    }, task.intervalMs);

    this.timerIds.set(task.name, timerId);
  }

  has(taskName: string): boolean {
    return this.timerIds.has(taskName);
  }

  stop(taskName: string): void {
    const timerId = this.timerIds.get(taskName);
    if (!timerId) {
      return;
    }

    clearInterval(timerId);
    this.timerIds.delete(taskName);
  }

  stopAll(): void {
    for (const [taskName] of this.timerIds) {
      this.stop(taskName);
    }
  }

  private async runTask(task: SchedulerTask): Promise<void> {
    try {
      await task.run();
    } catch (error) {
      this.logger.error({ task: task.name, error: describeError(error) }, 'scheduled task failed');
    }
  }
}
