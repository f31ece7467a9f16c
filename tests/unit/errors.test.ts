import { AxiosError } from 'axios';
import { describe, expect, it } from '@jest/globals';
import {
  ConfigurationError,
  LlmFallbackError,
  NotFoundError,
  ProviderError,
  ValidationError,
  toProviderError,
} from '@/utils/errors';

describe('error taxonomy', () => {
  it('carries HTTP status codes and class names', () => {
    expect(new ConfigurationError('x')).toMatchObject({ statusCode: 500, name: 'ConfigurationError' });
    expect(new ValidationError('x')).toMatchObject({ statusCode: 400, name: 'ValidationError' });
    expect(new NotFoundError('x')).toMatchObject({ statusCode: 404, name: 'NotFoundError' });
    expect(new ProviderError('http', 'Weather API', 'x', 503)).toMatchObject({
      statusCode: 502,
      name: 'ProviderError',
    });
  });

  it('describes a lone failure without a fallback clause', () => {
    const error = new LlmFallbackError([{ label: 'primary', error: new Error('down') }]);
    expect(error.message).toBe('Primary LLM failed (Error: down).');
  });
});

describe('toProviderError', () => {
  it('classifies timeouts', () => {
    const error = toProviderError(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED'), 'Weather API');
    expect(error).toMatchObject({ kind: 'timeout', message: 'Weather API request timed out' });
  });

  it('classifies network failures', () => {
    const error = toProviderError(new AxiosError('getaddrinfo ENOTFOUND', 'ENOTFOUND'), 'primary LLM');
    expect(error).toMatchObject({
      kind: 'network',
      message: 'primary LLM request failed: getaddrinfo ENOTFOUND',
    });
  });

  it('passes application errors and plain errors through', () => {
    const config = new ConfigurationError('missing');
    const plain = new TypeError('bug');
    expect(toProviderError(config, 'Weather API')).toBe(config);
    expect(toProviderError(plain, 'Weather API')).toBe(plain);
  });
});
