/**
 * Timestamp authority adapter - carries DER-encoded RFC 3161 messages
 * to and from a TSA. Encoding and checking is done by the TimestampClient.
 */
export interface TimestampAuthority {
  /**
   * Identifies the authority in logs (usually its URL)
   */
  readonly name: string;

  /**
   * Send a DER TimeStampReq and resolve with the DER TimeStampResp.
   * Rejects with TimestampTransportError when no reply could be obtained.
   */
  exchange(request: Buffer): Promise<Buffer>;
}

/**
 * The TSA could not be reached or answered outside the protocol
 */
export class TimestampTransportError extends Error {
  constructor(
    message: string,
    public readonly authority: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'TimestampTransportError';
  }
}
