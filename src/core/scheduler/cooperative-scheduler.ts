import { Logger } from '@nestjs/common';
import { Task, TaskKind } from './types';

/**
 * Single-threaded round-robin driver for cooperative tasks.
 *
 * One-shot tasks run once; cyclic tasks run one iteration per turn until the
 * signal aborts. An iteration that has begun always completes. If a task
 * throws, the remaining tasks are stopped and the error is rethrown.
 */
export class CooperativeScheduler {
  private readonly logger = new Logger(CooperativeScheduler.name);

  async run(tasks: Task[], signal: AbortSignal): Promise<void> {
    const started: Task[] = [];
    let failure: unknown;

    try {
      for (const task of tasks) {
        await task.start?.();
        started.push(task);
      }

      let runnable = [...tasks];
      while (runnable.length > 0) {
        const next: Task[] = [];

        for (const task of runnable) {
          if (task.kind === TaskKind.CYCLIC && signal.aborted) {
            continue;
          }

          await task.run(signal);

          if (task.kind === TaskKind.CYCLIC) {
            next.push(task);
          }
        }

        runnable = next;
        if (runnable.length > 0) {
          // yield to timers and I/O between rounds
          await new Promise<void>((resolve) => setImmediate(resolve));
        }
      }
    } catch (error) {
      failure = error;
      throw error;
    } finally {
      await this.stopAll(started, failure);
    }
  }

  private async stopAll(tasks: Task[], failure: unknown): Promise<void> {
    for (const task of [...tasks].reverse()) {
      try {
        await task.stop?.();
      } catch (error) {
        this.logger.error(
          `Task ${task.name} failed to stop: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    if (failure) {
      this.logger.error(
        `Scheduler halted: ${failure instanceof Error ? failure.message : String(failure)}`,
      );
    }
  }
}
