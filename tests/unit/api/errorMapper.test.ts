import { describe, it, expect } from 'vitest';
import {
  INTERNAL_ERROR_MESSAGE,
  isUnclassifiedError,
  mapErrorToResponse,
} from '../../../src/api/errorMapper.js';
import { LLMError } from '../../../src/errors/base.js';
import { GenerationError, ModelLoadError, TokenizationError } from '../../../src/errors/inference.js';
import { RequestValidationError } from '../../../src/errors/validation.js';

describe('mapErrorToResponse', () => {
  it('maps ModelLoadError to 503 MODEL_LOAD_FAILED', () => {
    expect(mapErrorToResponse(new ModelLoadError('model failed to load'))).toEqual({
      statusCode: 503,
      body: { error: 'MODEL_LOAD_FAILED', detail: 'model failed to load' },
    });
  });

  it('maps TokenizationError to 400 TOKENIZATION_FAILED', () => {
    expect(mapErrorToResponse(new TokenizationError('bad input'))).toEqual({
      statusCode: 400,
      body: { error: 'TOKENIZATION_FAILED', detail: 'bad input' },
    });
  });

  it('maps GenerationError to 500 GENERATION_FAILED', () => {
    expect(mapErrorToResponse(new GenerationError('generation crashed'))).toEqual({
      statusCode: 500,
      body: { error: 'GENERATION_FAILED', detail: 'generation crashed' },
    });
  });

  it('maps a bare LLMError by its code', () => {
    expect(mapErrorToResponse(new LLMError('tokenizer gone', 'TOKENIZATION_FAILED')).statusCode).toBe(400);
  });

  it('does not expose the underlying cause of a domain error', () => {
    const error = new GenerationError('Text generation failed', new Error('CUDA error at 0xdeadbeef'));
    expect(mapErrorToResponse(error).body).toEqual({
      error: 'GENERATION_FAILED',
      detail: 'Text generation failed',
    });
  });

  it('maps RequestValidationError to 422 with its field violations', () => {
    const details = [{ loc: ['body', 'prompt'], msg: 'Must not be empty', type: 'too_small' }];
    expect(mapErrorToResponse(new RequestValidationError(details))).toEqual({
      statusCode: 422,
      body: { error: 'VALIDATION_ERROR', details },
    });
  });

  it('maps a JSON body that does not parse to 422 json_invalid', () => {
    const syntax = Object.assign(new SyntaxError('Unexpected end of JSON input'), { statusCode: 400 });
    expect(mapErrorToResponse(syntax)).toEqual({
      statusCode: 422,
      body: {
        error: 'VALIDATION_ERROR',
        details: [{ loc: ['body'], msg: 'JSON decode error', type: 'json_invalid' }],
      },
    });
    const coded = Object.assign(new Error('Body is not valid JSON'), {
      code: 'FST_ERR_CTP_INVALID_JSON_BODY',
      statusCode: 400,
    });
    expect(mapErrorToResponse(coded).statusCode).toBe(422);
  });

  it('maps an empty JSON body to 422 missing', () => {
    const empty = Object.assign(new Error('Body cannot be empty'), {
      code: 'FST_ERR_CTP_EMPTY_JSON_BODY',
      statusCode: 400,
    });
    expect(mapErrorToResponse(empty)).toEqual({
      statusCode: 422,
      body: {
        error: 'VALIDATION_ERROR',
        details: [{ loc: ['body'], msg: 'Field required', type: 'missing' }],
      },
    });
  });

  it('maps errors with an explicit HTTP status to HTTP_ERROR with the reason phrase', () => {
    const tooLarge = Object.assign(new Error('Request body is too large'), { statusCode: 413 });
    expect(mapErrorToResponse(tooLarge)).toEqual({
      statusCode: 413,
      body: { error: 'HTTP_ERROR', message: 'Payload Too Large' },
    });
  });

  it('ignores statusCode values outside the error range', () => {
    const odd = Object.assign(new Error('weird'), { statusCode: 302 });
    expect(mapErrorToResponse(odd).statusCode).toBe(500);
  });

  it('maps anything else to a 500 with no detail', () => {
    for (const error of [new Error('db password is hunter2'), 'a string', null, { nope: true }]) {
      expect(mapErrorToResponse(error)).toEqual({
        statusCode: 500,
        body: { error: 'INTERNAL_SERVER_ERROR', message: INTERNAL_ERROR_MESSAGE },
      });
    }
  });
});

describe('isUnclassifiedError', () => {
  it('is false for domain, validation and HTTP errors', () => {
    expect(isUnclassifiedError(new TokenizationError('x'))).toBe(false);
    expect(isUnclassifiedError(new RequestValidationError([]))).toBe(false);
    expect(isUnclassifiedError(Object.assign(new Error('x'), { statusCode: 404 }))).toBe(false);
  });

  it('is true for plain errors', () => {
    expect(isUnclassifiedError(new TypeError('undefined is not a function'))).toBe(true);
  });
});
