export enum TaskKind {
  CYCLIC = 'cyclic',
  ONE_SHOT = 'one-shot',
}

interface TaskHooks {
  name: string;

  /**
   * Called once before the first run
   */
  start?(): void | Promise<void>;

  /**
   * Called once after the last run, also when start or run threw
   */
  stop?(): void | Promise<void>;
}

/**
 * Runs repeatedly until the scheduler is aborted.
 * Each call to `run` is one iteration; the signal is checked between calls.
 */
export interface CyclicTask extends TaskHooks {
  kind: TaskKind.CYCLIC;
  run(signal: AbortSignal): Promise<void>;
}

/**
 * Runs once, then is done
 */
export interface OneShotTask extends TaskHooks {
  kind: TaskKind.ONE_SHOT;
  run(signal: AbortSignal): Promise<void>;
}

export type Task = CyclicTask | OneShotTask;
