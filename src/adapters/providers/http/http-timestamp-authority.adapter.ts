import {
  TimestampAuthority,
  TimestampTransportError,
} from '../../../core';

export interface HttpTimestampAuthorityConfig {
  url: string;
  timeoutMs?: number;
  username?: string;
  password?: string;
}

const TIMESTAMP_QUERY = 'application/timestamp-query';
const TIMESTAMP_REPLY = 'application/timestamp-reply';

/**
 * RFC 3161 over HTTP(S) (RFC 3161 section 3.4).
 * TLS server certificates are checked by the runtime's default trust store.
 */
export class HttpTimestampAuthority implements TimestampAuthority {
  readonly name: string;
  private readonly timeoutMs: number;

  constructor(private readonly config: HttpTimestampAuthorityConfig) {
    this.name = config.url;
    this.timeoutMs = config.timeoutMs ?? 30000;
  }

  async exchange(request: Buffer): Promise<Buffer> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    const headers: Record<string, string> = {
      'Content-Type': TIMESTAMP_QUERY,
      Accept: TIMESTAMP_REPLY,
    };
    if (this.config.username) {
      const credentials = `${this.config.username}:${this.config.password ?? ''}`;
      headers.Authorization = `Basic ${Buffer.from(credentials).toString('base64')}`;
    }

    try {
      const response = await fetch(this.config.url, {
        method: 'POST',
        headers,
        body: new Uint8Array(request),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new TimestampTransportError(
          `TSA answered ${response.status} ${response.statusText}`,
          this.name,
          response.status,
        );
      }

      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof TimestampTransportError) {
        throw error;
      }
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new TimestampTransportError(`TSA request failed: ${reason}`, this.name);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
