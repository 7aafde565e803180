/**
 * ScanRecord domain model - one ingested probe result.
 *
 * Append-only: records are never updated or deleted. `payloadBytes` holds the
 * exact bytes that were digested for timestamping; `payload` is their parsed
 * form for presentation and filtering.
 */
export class ScanRecord {
  constructor(
    public readonly id: string,
    public readonly correlationId: string,
    public readonly payloadBytes: Buffer,
    public readonly createdAt: Date = new Date(),
    public readonly probe: string | null = null,
    public readonly scannedAt: Date | null = null,
  ) {}

  /**
   * Parsed payload content
   */
  get payload(): Record<string, unknown> {
    const parsed: unknown = JSON.parse(this.payloadBytes.toString('utf8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return { raw: this.payloadBytes.toString('base64') };
    }
    return { ...parsed };
  }

  /**
   * Case-insensitive substring match over the payload text
   */
  matches(text: string): boolean {
    if (!text) return true;
    return this.payloadBytes
      .toString('utf8')
      .toLowerCase()
      .includes(text.toLowerCase());
  }

  /**
   * Convert to plain object for serialization
   */
  toPlainObject(): Record<string, unknown> {
    return {
      id: this.id,
      correlationId: this.correlationId,
      payload: this.payload,
      probe: this.probe,
      scannedAt: this.scannedAt,
      createdAt: this.createdAt,
    };
  }

  toJSON(): Record<string, unknown> {
    return this.toPlainObject();
  }
}
