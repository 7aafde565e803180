/**
 * Ingestion outcomes - every receive attempt of the loop ends in one of these
 */
export enum MessageFate {
  /**
   * Scan record and timestamp token were both persisted
   */
  PERSISTED = 'persisted',

  /**
   * The receive timed out without a message
   */
  NO_MESSAGE = 'no_message',

  /**
   * Message bytes did not match the probe message schema
   */
  INVALID = 'invalid',

  /**
   * A scan record already exists for the correlation identifier
   */
  DUPLICATE = 'duplicate',

  /**
   * The timestamp authority could not be reached or refused the request
   */
  TIMESTAMP_FAILED = 'timestamp_failed',
}
