import { QueueTransportAdapter } from '../../src';

describe('QueueTransportAdapter', () => {
  let queue: QueueTransportAdapter;

  beforeEach(() => {
    queue = new QueueTransportAdapter(2);
  });

  it('should deliver messages in arrival order', async () => {
    queue.push(Buffer.from('first'));
    queue.push(Buffer.from('second'));

    expect(queue.pending()).toBe(2);
    expect((await queue.receive(10))?.toString()).toBe('first');
    expect((await queue.receive(10))?.toString()).toBe('second');
    expect(queue.pending()).toBe(0);
  });

  it('should refuse messages beyond its capacity', () => {
    expect(queue.push(Buffer.from('a'))).toBe(true);
    expect(queue.push(Buffer.from('b'))).toBe(true);
    expect(queue.push(Buffer.from('c'))).toBe(false);
    expect(queue.pending()).toBe(2);
    expect(queue.getCapacity()).toBe(2);
  });

  it('should resolve null when nothing arrives in time', async () => {
    await expect(queue.receive(10)).resolves.toBeNull();
  });

  it('should hand a pushed message to a waiting receiver', async () => {
    const receiving = queue.receive(1000);
    queue.push(Buffer.from('late'));

    expect((await receiving)?.toString()).toBe('late');
    expect(queue.pending()).toBe(0);
  });

  it('should resolve null when the signal aborts', async () => {
    const controller = new AbortController();
    const receiving = queue.receive(1000, controller.signal);
    controller.abort();

    await expect(receiving).resolves.toBeNull();

    // the aborted receiver no longer takes messages
    queue.push(Buffer.from('kept'));
    expect(queue.pending()).toBe(1);
  });

  it('should not wait when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(queue.receive(1000, controller.signal)).resolves.toBeNull();
  });

  it('should keep its own copy of the bytes', async () => {
    const message = Buffer.from('original');
    queue.push(message);
    message.write('modified');

    expect((await queue.receive(10))?.toString()).toBe('original');
  });
});
