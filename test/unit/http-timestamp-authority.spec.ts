import { HttpTimestampAuthority, TimestampTransportError } from '../../src';

describe('HttpTimestampAuthority', () => {
  let fetchMock: jest.SpyInstance;

  beforeEach(() => {
    fetchMock = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('should post the request as application/timestamp-query', async () => {
    fetchMock.mockResolvedValue(new Response(new Uint8Array([0x30, 0x03, 0x02, 0x01, 0x00])));
    const authority = new HttpTimestampAuthority({ url: 'http://tsa.test/tsr' });

    const reply = await authority.exchange(Buffer.from([0x30, 0x00]));

    expect(reply).toEqual(Buffer.from([0x30, 0x03, 0x02, 0x01, 0x00]));
    expect(authority.name).toBe('http://tsa.test/tsr');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://tsa.test/tsr');
    expect(init).toMatchObject({
      method: 'POST',
      headers: {
        'Content-Type': 'application/timestamp-query',
        Accept: 'application/timestamp-reply',
      },
      body: new Uint8Array([0x30, 0x00]),
    });
  });

  it('should send basic credentials when configured', async () => {
    fetchMock.mockResolvedValue(new Response(new Uint8Array([0x30, 0x00])));
    const authority = new HttpTimestampAuthority({
      url: 'https://tsa.test/tsr',
      username: 'probe',
      password: 'test-secret',
    });

    await authority.exchange(Buffer.from([0x30, 0x00]));

    expect(fetchMock.mock.calls[0][1].headers.Authorization).toBe(
      `Basic ${Buffer.from('probe:test-secret').toString('base64')}`,
    );
  });

  it('should treat a non-2xx answer as a transport failure', async () => {
    fetchMock.mockResolvedValue(
      new Response('busy', { status: 503, statusText: 'Service Unavailable' }),
    );
    const authority = new HttpTimestampAuthority({ url: 'http://tsa.test/tsr' });

    const error = await authority.exchange(Buffer.from([0x30, 0x00])).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimestampTransportError);
    expect(error).toMatchObject({
      message: 'TSA answered 503 Service Unavailable',
      authority: 'http://tsa.test/tsr',
      statusCode: 503,
    });
  });

  it('should wrap network errors', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const authority = new HttpTimestampAuthority({ url: 'http://tsa.test/tsr' });

    await expect(authority.exchange(Buffer.from([0x30, 0x00]))).rejects.toMatchObject({
      name: 'TimestampTransportError',
      message: 'TSA request failed: fetch failed',
    });
  });

  it('should give up after the timeout', async () => {
    fetchMock.mockImplementation(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const authority = new HttpTimestampAuthority({ url: 'http://tsa.test/tsr', timeoutMs: 10 });

    await expect(authority.exchange(Buffer.from([0x30, 0x00]))).rejects.toMatchObject({
      message: 'TSA request failed: timed out after 10ms',
    });
  });
});
