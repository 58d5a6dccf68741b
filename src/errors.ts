/**
 * Failure classes reported by the Chaos Monkey client.
 *
 * - `NETWORK_ERROR`: the exchange never completed (refused, DNS, aborted)
 * - `REMOTE_ERROR`: non-200 status with a message from the server
 * - `HTTP_ERROR`: non-200 status without a usable message
 * - `MALFORMED_RESPONSE`: 200 status but the body could not be decoded
 */
export type ChaosMonkeyErrorCode =
  | 'NETWORK_ERROR'
  | 'REMOTE_ERROR'
  | 'HTTP_ERROR'
  | 'MALFORMED_RESPONSE';

/**
 * Error thrown by Chaos Monkey client operations.
 */
export class ChaosMonkeyError extends Error {
  /**
   * Creates a new ChaosMonkeyError.
   * @param message - Human-readable error message
   * @param statusCode - HTTP status code, 0 when no response was received
   * @param code - Machine-readable failure class
   * @param options - Standard error options, used to carry the underlying `cause`
   */
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: ChaosMonkeyErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ChaosMonkeyError';
    Object.setPrototypeOf(this, ChaosMonkeyError.prototype);
  }
}
