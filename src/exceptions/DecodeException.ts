/**
 * Why a payload could not be decoded
 */
export type DecodeErrorKind = 'not_an_object' | 'invalid_json' | 'missing_field' | 'invalid_type' | 'missing_user';

/**
 * Exception thrown when an inbound payload does not match the model
 */
export class DecodeException extends Error {
  readonly kind: DecodeErrorKind;

  /** Dotted path of the offending key, when there is one */
  readonly field?: string;

  constructor(kind: DecodeErrorKind, message: string, field?: string) {
    super(message);
    this.name = 'DecodeException';
    this.kind = kind;
    this.field = field;
  }

  static missingField(field: string): DecodeException {
    return new DecodeException('missing_field', `missing field \`${field}\``, field);
  }

  static invalidType(field: string, detail: string): DecodeException {
    return new DecodeException('invalid_type', `invalid type at \`${field}\`: ${detail}`, field);
  }

  static missingUser(): DecodeException {
    return new DecodeException('missing_user', 'missing user or member');
  }

  static notAnObject(context: string): DecodeException {
    return new DecodeException('not_an_object', `expected ${context} to be a JSON object`);
  }

  static invalidJson(cause: Error): DecodeException {
    const exception = new DecodeException('invalid_json', `invalid JSON: ${cause.message}`);
    exception.cause = cause;
    return exception;
  }
}
