/**
 * Exception thrown when a request to Discord fails
 *
 * Covers both responses with a non-2xx status and requests that never got a
 * response. The Discord error code is set when the body was a Discord error
 * object, e.g. 10008 when the message was already deleted.
 */
export class HttpException extends Error {
  /** HTTP status, absent when there was no response */
  readonly status?: number;

  readonly statusText?: string;

  /** Transport error code such as ECONNREFUSED or ECONNABORTED */
  readonly code?: string;

  /** JSON error code from the response body */
  readonly discordCode?: number;

  constructor(
    message: string,
    details: { status?: number; statusText?: string; code?: string; discordCode?: number } = {},
    cause?: Error,
  ) {
    super(message);
    this.name = 'HttpException';
    this.status = details.status;
    this.statusText = details.statusText;
    this.code = details.code;
    this.discordCode = details.discordCode;
    if (cause) {
      this.cause = cause;
    }
  }
}
