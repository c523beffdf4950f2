import { STATUS_CODES } from 'node:http';
import { LLMError, type LLMErrorCode } from '../errors/base.js';
import { RequestValidationError, type FieldViolation } from '../errors/validation.js';

export const INTERNAL_ERROR_MESSAGE = 'Something went wrong';

export type ErrorBody =
  | { error: LLMErrorCode; detail: string }
  | { error: 'VALIDATION_ERROR'; details: FieldViolation[] }
  | { error: 'HTTP_ERROR'; message: string }
  | { error: 'INTERNAL_SERVER_ERROR'; message: string };

export interface ErrorResponse {
  statusCode: number;
  body: ErrorBody;
}

const LLM_ERROR_STATUS: Readonly<Record<LLMErrorCode, number>> = {
  MODEL_LOAD_FAILED: 503,
  TOKENIZATION_FAILED: 400,
  GENERATION_FAILED: 500,
};

/** Status carried by framework errors (bad JSON, payload too large, ...). */
function explicitHttpStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) {
    return undefined;
  }
  const { statusCode } = error;
  if (typeof statusCode === 'number' && Number.isInteger(statusCode) && statusCode >= 400 && statusCode <= 599) {
    return statusCode;
  }
  return undefined;
}

const EMPTY_JSON_BODY = 'FST_ERR_CTP_EMPTY_JSON_BODY';
const INVALID_JSON_BODY = 'FST_ERR_CTP_INVALID_JSON_BODY';

function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

/**
 * A JSON body the parser rejected is reported like any other schema failure:
 * `missing` when the body is empty, `json_invalid` when it does not parse.
 */
export function bodyParseViolation(error: unknown): FieldViolation | undefined {
  const code = errorCode(error);
  if (code === EMPTY_JSON_BODY) {
    return { loc: ['body'], msg: 'Field required', type: 'missing' };
  }
  if (code === INVALID_JSON_BODY || (error instanceof SyntaxError && explicitHttpStatus(error) === 400)) {
    return { loc: ['body'], msg: 'JSON decode error', type: 'json_invalid' };
  }
  return undefined;
}

export function httpErrorResponse(statusCode: number): ErrorResponse {
  return {
    statusCode,
    body: { error: 'HTTP_ERROR', message: STATUS_CODES[statusCode] ?? 'Unknown Error' },
  };
}

/**
 * Single place deciding status and body for a failed request. Most specific
 * match first; anything unrecognised becomes a 500 with no detail.
 */
export function mapErrorToResponse(error: unknown): ErrorResponse {
  if (error instanceof RequestValidationError) {
    return { statusCode: 422, body: { error: 'VALIDATION_ERROR', details: error.details } };
  }

  const violation = bodyParseViolation(error);
  if (violation !== undefined) {
    return { statusCode: 422, body: { error: 'VALIDATION_ERROR', details: [violation] } };
  }

  if (error instanceof LLMError) {
    return {
      statusCode: LLM_ERROR_STATUS[error.code],
      body: { error: error.code, detail: error.message },
    };
  }

  const statusCode = explicitHttpStatus(error);
  if (statusCode !== undefined) {
    return httpErrorResponse(statusCode);
  }

  return {
    statusCode: 500,
    body: { error: 'INTERNAL_SERVER_ERROR', message: INTERNAL_ERROR_MESSAGE },
  };
}

/** True when the error only reaches clients through the catch-all branch. */
export function isUnclassifiedError(error: unknown): boolean {
  return mapErrorToResponse(error).body.error === 'INTERNAL_SERVER_ERROR';
}
