/**
 * Transport adapter - delivers opaque probe message bodies.
 *
 * Ordering and at-least-once delivery per sender are the adapter's concern.
 */
export interface TransportAdapter {
  /**
   * Wait up to `timeoutMs` for the next message body.
   * Resolves with null when the timeout elapses or `signal` aborts first.
   */
  receive(timeoutMs: number, signal?: AbortSignal): Promise<Buffer | null>;

  /**
   * Number of messages waiting, where the adapter can tell
   */
  pending?(): number;
}
