import { Logger } from '@nestjs/common';
import { MessageFate } from '../domain/enums';
import { LifecycleHooks, TransportAdapter } from '../interfaces';
import { IngestionProcessor, ProcessingResult } from '../pipeline';
import { CooperativeScheduler, CyclicTask, Task, TaskKind } from '../scheduler';

export type IngestionLoopState = 'idle' | 'running' | 'stopped' | 'failed';

export interface IngestionLoopOptions {
  receiveTimeoutMs: number;
  hooks?: LifecycleHooks;
}

export interface IngestionLoopStatistics {
  state: IngestionLoopState;
  iterations: number;
  fates: Record<MessageFate, number>;
  lastError?: string;
}

/**
 * Ingestion loop
 *
 * Pulls one message at a time from the transport and hands it to the
 * processor. Dropped messages never stop the loop; a persistence failure
 * (or any other unexpected pipeline error) does, after onFatal has fired.
 */
export class IngestionLoop {
  private readonly logger = new Logger(IngestionLoop.name);
  private state: IngestionLoopState = 'idle';
  private iterations = 0;
  private lastError?: Error;
  private readonly fates: Record<MessageFate, number> = {
    [MessageFate.PERSISTED]: 0,
    [MessageFate.NO_MESSAGE]: 0,
    [MessageFate.INVALID]: 0,
    [MessageFate.DUPLICATE]: 0,
    [MessageFate.TIMESTAMP_FAILED]: 0,
  };

  constructor(
    private readonly transport: TransportAdapter,
    private readonly processor: IngestionProcessor,
    private readonly options: IngestionLoopOptions,
  ) {}

  /**
   * Run until `signal` aborts. The message in flight when it does is
   * finished before this resolves.
   */
  async run(signal: AbortSignal, extraTasks: Task[] = []): Promise<void> {
    await new CooperativeScheduler().run([...extraTasks, this.asTask()], signal);
  }

  /**
   * One receive and, if something arrived, one pipeline pass
   */
  async tick(signal?: AbortSignal): Promise<MessageFate> {
    this.iterations++;
    const startTime = Date.now();
    const rawMessage = await this.transport.receive(
      this.options.receiveTimeoutMs,
      signal,
    );

    if (rawMessage === null) {
      this.fates[MessageFate.NO_MESSAGE]++;
      this.logger.debug(
        `No message within ${this.options.receiveTimeoutMs}ms`,
      );
      await this.processor.emitFate({
        fate: MessageFate.NO_MESSAGE,
        latencyMs: Date.now() - startTime,
      });
      return MessageFate.NO_MESSAGE;
    }

    let result: ProcessingResult;
    try {
      result = await this.processor.processMessage(rawMessage);
    } catch (error) {
      await this.fail(error instanceof Error ? error : new Error(String(error)));
      throw error;
    }

    this.fates[result.fate]++;
    return result.fate;
  }

  asTask(): CyclicTask {
    return {
      kind: TaskKind.CYCLIC,
      name: 'ingestion-loop',
      start: () => {
        this.state = 'running';
        this.logger.log(
          `Ingestion loop started (receive timeout ${this.options.receiveTimeoutMs}ms)`,
        );
      },
      run: async (signal) => {
        await this.tick(signal);
      },
      stop: () => {
        if (this.state === 'running') {
          this.state = 'stopped';
        }
        this.logger.log(`Ingestion loop ${this.state} after ${this.iterations} iteration(s)`);
      },
    };
  }

  getState(): IngestionLoopState {
    return this.state;
  }

  getStatistics(): IngestionLoopStatistics {
    return {
      state: this.state,
      iterations: this.iterations,
      fates: { ...this.fates },
      lastError: this.lastError?.message,
    };
  }

  private async fail(error: Error): Promise<void> {
    this.state = 'failed';
    this.lastError = error;
    this.logger.error(`Ingestion halted: ${error.message}`, error.stack);

    if (!this.options.hooks?.onFatal) return;
    try {
      await this.options.hooks.onFatal(error);
    } catch (hookError) {
      this.logger.error(
        `onFatal hook failed: ${hookError instanceof Error ? hookError.message : String(hookError)}`,
      );
    }
  }
}
