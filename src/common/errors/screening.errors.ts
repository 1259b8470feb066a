import { HttpException, HttpStatus } from '@nestjs/common';

export type ScreeningErrorType =
  | 'ValidationError'
  | 'ExtractionError'
  | 'UpstreamError'
  | 'ParseError';

/**
 * Base class for every failure a screening request can end with.
 * The global exception filter renders these as `{ error, type }`.
 */
export abstract class ScreeningError extends HttpException {
  abstract readonly type: ScreeningErrorType;

  protected constructor(message: string, status: HttpStatus) {
    super(message, status);
  }
}

/** Missing or blank request fields. */
export class ValidationError extends ScreeningError {
  readonly type = 'ValidationError';

  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

/** The uploaded document could not be turned into text. */
export class ExtractionError extends ScreeningError {
  readonly type = 'ExtractionError';

  constructor(
    message: string,
    status:
      | HttpStatus.UNSUPPORTED_MEDIA_TYPE
      | HttpStatus.PAYLOAD_TOO_LARGE
      | HttpStatus.UNPROCESSABLE_ENTITY = HttpStatus.UNPROCESSABLE_ENTITY,
  ) {
    super(message, status);
  }

  static unsupportedType(description: string): ExtractionError {
    return new ExtractionError(
      `Unsupported file type: ${description}. Supported formats: PDF, DOCX, TXT`,
      HttpStatus.UNSUPPORTED_MEDIA_TYPE,
    );
  }
}

/** The AI provider was unreachable, timed out, or answered with an error. */
export class UpstreamError extends ScreeningError {
  readonly type = 'UpstreamError';

  constructor(
    message: string,
    status:
      | HttpStatus.BAD_GATEWAY
      | HttpStatus.GATEWAY_TIMEOUT = HttpStatus.BAD_GATEWAY,
  ) {
    super(message, status);
  }
}

/** The model's reply was not an evaluation in the expected shape. */
export class ParseError extends ScreeningError {
  readonly type = 'ParseError';

  constructor(message: string) {
    super(message, HttpStatus.BAD_GATEWAY);
  }
}
