/**
 * Local validation failures raised before a request is sent
 */
export type ModelErrorKind = 'message_too_long' | 'too_many_embeds';

/**
 * Exception thrown when an outbound message breaks a Discord limit
 */
export class ModelException extends Error {
  readonly kind: ModelErrorKind;

  /** How far over the limit the value is */
  readonly overflow: number;

  constructor(kind: ModelErrorKind, overflow: number, message: string) {
    super(message);
    this.name = 'ModelException';
    this.kind = kind;
    this.overflow = overflow;
  }

  static messageTooLong(overflow: number, limit: number): ModelException {
    return new ModelException(
      'message_too_long',
      overflow,
      `message content is ${overflow} code points over the limit of ${limit}`,
    );
  }

  static tooManyEmbeds(overflow: number, limit: number): ModelException {
    return new ModelException('too_many_embeds', overflow, `message has ${overflow} embeds over the limit of ${limit}`);
  }
}
