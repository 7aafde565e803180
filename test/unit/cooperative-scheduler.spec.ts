import { CooperativeScheduler, Task, TaskKind } from '../../src';

describe('CooperativeScheduler', () => {
  let scheduler: CooperativeScheduler;
  let events: string[];

  beforeEach(() => {
    scheduler = new CooperativeScheduler();
    events = [];
  });

  function oneShot(name: string, run?: () => Promise<void>): Task {
    return {
      kind: TaskKind.ONE_SHOT,
      name,
      start: () => {
        events.push(`${name}:start`);
      },
      run: async () => {
        events.push(`${name}:run`);
        await run?.();
      },
      stop: () => {
        events.push(`${name}:stop`);
      },
    };
  }

  function cyclic(name: string, run: (iteration: number) => void): Task {
    let iteration = 0;
    return {
      kind: TaskKind.CYCLIC,
      name,
      start: () => {
        events.push(`${name}:start`);
      },
      run: async () => {
        events.push(`${name}:run`);
        run(++iteration);
      },
      stop: () => {
        events.push(`${name}:stop`);
      },
    };
  }

  it('should run one-shot tasks once and cyclic tasks until aborted', async () => {
    const controller = new AbortController();

    await scheduler.run(
      [
        oneShot('check'),
        cyclic('loop', (iteration) => {
          if (iteration === 3) controller.abort();
        }),
      ],
      controller.signal,
    );

    expect(events).toEqual([
      'check:start',
      'loop:start',
      'check:run',
      'loop:run',
      'loop:run',
      'loop:run',
      'loop:stop',
      'check:stop',
    ]);
  });

  it('should not start a cyclic iteration once aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await scheduler.run(
      [oneShot('check'), cyclic('loop', () => undefined)],
      controller.signal,
    );

    expect(events).toEqual(['check:start', 'loop:start', 'check:run', 'loop:stop', 'check:stop']);
  });

  it('should stop every started task and rethrow when a task fails', async () => {
    const failure = new Error('store unreachable');

    await expect(
      scheduler.run(
        [
          oneShot('check', async () => {
            throw failure;
          }),
          cyclic('loop', () => undefined),
        ],
        new AbortController().signal,
      ),
    ).rejects.toBe(failure);

    expect(events).toEqual(['check:start', 'loop:start', 'check:run', 'loop:stop', 'check:stop']);
  });

  it('should only stop tasks that started', async () => {
    const failing: Task = {
      kind: TaskKind.CYCLIC,
      name: 'broken',
      start: () => {
        throw new Error('cannot start');
      },
      run: async () => undefined,
      stop: () => {
        events.push('broken:stop');
      },
    };

    await expect(
      scheduler.run([oneShot('check'), failing], new AbortController().signal),
    ).rejects.toThrow('cannot start');

    expect(events).toEqual(['check:start', 'check:stop']);
  });

  it('should not fail when a task cannot stop', async () => {
    const controller = new AbortController();
    const task: Task = {
      kind: TaskKind.CYCLIC,
      name: 'sticky',
      run: async () => {
        controller.abort();
      },
      stop: () => {
        throw new Error('still busy');
      },
    };

    await expect(scheduler.run([task], controller.signal)).resolves.toBeUndefined();
  });
});
