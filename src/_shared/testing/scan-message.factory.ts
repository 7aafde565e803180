/**
 * Builds probe message bytes for tests and local experiments
 */
export interface ScanMessageOptions {
  correlationId?: string;
  payload?: Record<string, unknown>;
  probe?: string;
  scannedAt?: string;
  extra?: Record<string, unknown>;
}

export class ScanMessageFactory {
  private static counter = 0;

  /**
   * A valid message as raw bytes
   */
  static build(options: ScanMessageOptions = {}): Buffer {
    return Buffer.from(JSON.stringify(this.buildObject(options)), 'utf8');
  }

  static buildObject(options: ScanMessageOptions = {}): Record<string, unknown> {
    const message: Record<string, unknown> = {
      correlationId: options.correlationId ?? this.nextCorrelationId(),
      payload: options.payload ?? { host: '10.0.0.1', port: 22, state: 'open' },
    };
    if (options.probe !== undefined) message.probe = options.probe;
    if (options.scannedAt !== undefined) message.scannedAt = options.scannedAt;

    return { ...message, ...options.extra };
  }

  static nextCorrelationId(): string {
    return `scan-${++this.counter}`;
  }

  static reset(): void {
    this.counter = 0;
  }
}
