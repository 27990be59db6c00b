import { DecodeException } from './DecodeException';

/**
 * Exception thrown when a successful response body does not decode
 */
export class JsonException extends Error {
  readonly decodeError: DecodeException;

  constructor(route: string, decodeError: DecodeException) {
    super(`unexpected response body from ${route}: ${decodeError.message}`);
    this.name = 'JsonException';
    this.decodeError = decodeError;
    this.cause = decodeError;
  }
}
