/**
 * TimestampToken domain model - a signed RFC 3161 proof of existence
 * for the scan record sharing its correlation identifier
 */
export class TimestampToken {
  constructor(
    public readonly id: string,
    public readonly correlationId: string,
    public readonly token: Buffer,
    public readonly createdAt: Date = new Date(),
  ) {}

  /**
   * Token bytes as base64, the form used on the wire
   */
  get encodedToken(): string {
    return this.token.toString('base64');
  }

  toPlainObject(): Record<string, unknown> {
    return {
      id: this.id,
      correlationId: this.correlationId,
      token: this.encodedToken,
      createdAt: this.createdAt,
    };
  }

  toJSON(): Record<string, unknown> {
    return this.toPlainObject();
  }
}
