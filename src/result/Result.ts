import { ReturnCode, ReturnCodeValue } from '../constants';
import { DecodeException } from '../exceptions/DecodeException';
import { HttpException } from '../exceptions/HttpException';
import { JsonException } from '../exceptions/JsonException';
import { ModelException } from '../exceptions/ModelException';

/**
 * Outcome of an interaction operation
 */
export class Result<T = void> {
  private readonly code: ReturnCodeValue;
  private readonly description: string;
  private readonly result?: T;
  private readonly error?: Error;

  constructor(code: ReturnCodeValue, description: string, result?: T, error?: Error) {
    this.code = code;
    this.description = description;
    this.result = result;
    this.error = error;
  }

  getCode(): ReturnCodeValue {
    return this.code;
  }

  getDescription(): string {
    return this.description;
  }

  getResult(): T | undefined {
    return this.result;
  }

  /**
   * The exception behind a failed result
   */
  getError(): Error | undefined {
    return this.error;
  }

  isSuccess(): boolean {
    return this.code === ReturnCode.SUCCESS;
  }

  /**
   * Create success result with a value
   */
  static successWithResult<T>(result: T): Result<T> {
    return new Result<T>(ReturnCode.SUCCESS, 'Success', result);
  }

  /**
   * Create failure result classified by the exception type
   */
  static fromError<T>(error: unknown): Result<T> {
    if (error instanceof ModelException) {
      return new Result<T>(ReturnCode.VALIDATION_ERROR, error.message, undefined, error);
    }
    if (error instanceof HttpException) {
      return new Result<T>(ReturnCode.HTTP_ERROR, error.message, undefined, error);
    }
    if (error instanceof JsonException || error instanceof DecodeException) {
      return new Result<T>(ReturnCode.JSON_ERROR, error.message, undefined, error);
    }
    if (error instanceof Error) {
      return new Result<T>(ReturnCode.FAILURE, error.message, undefined, error);
    }
    return new Result<T>(ReturnCode.FAILURE, String(error));
  }
}
