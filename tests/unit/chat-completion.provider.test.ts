import { describe, expect, it } from '@jest/globals';
import {
  buildRequestBody,
  parseModelContent,
  serializeContext,
} from '@/services/providers/chat-completion.provider';
import { LlmParseError } from '@/utils/errors';

describe('serializeContext', () => {
  it('passes strings through', () => {
    expect(serializeContext('plain context')).toBe('plain context');
  });

  it('drops metadata keys from structured context', () => {
    expect(
      serializeContext({
        description: 'kept',
        _raw_llm_response: 'dropped',
        _model_used: 'dropped',
        _provider_label: 'primary',
      }),
    ).toBe('{"description":"kept"}');
  });
});

describe('buildRequestBody', () => {
  it('asks for JSON output when the provider supports it', () => {
    expect(buildRequestBody('ctx', 'sys', 'model-a', true)).toEqual({
      model: 'model-a',
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'ctx' },
      ],
      stream: false,
      response_format: { type: 'json_object' },
    });
  });

  it('omits response_format otherwise', () => {
    expect(buildRequestBody('ctx', 'sys', 'model-a', false)).not.toHaveProperty('response_format');
  });
});

describe('parseModelContent', () => {
  it('parses wrapped JSON', () => {
    expect(parseModelContent('<think>x</think>```json\n{"description":"Hi"}\n```')).toEqual({
      description: 'Hi',
    });
  });

  it('accepts both daily forecast shapes', () => {
    expect(parseModelContent('{"daily_forecasts":{"Tuesday":"Rain"}}').daily_forecasts).toEqual({
      Tuesday: 'Rain',
    });
    expect(parseModelContent('{"daily_forecasts":["Rain","Sun"]}').daily_forecasts).toEqual([
      'Rain',
      'Sun',
    ]);
  });

  it('rejects invalid JSON with a bounded preview', () => {
    const raw = `not json ${'x'.repeat(300)}`;
    try {
      parseModelContent(raw);
      throw new Error('expected a parse error');
    } catch (error) {
      expect(error).toBeInstanceOf(LlmParseError);
      if (error instanceof LlmParseError) {
        expect(error.preview).toBe(`${raw.slice(0, 200)}...`);
        expect(error.message).toMatch(/^LLM returned invalid JSON: /);
      }
    }
  });

  it('rejects JSON that is not an object', () => {
    expect(() => parseModelContent('[1, 2]')).toThrow('LLM returned JSON that is not a report object');
    expect(() => parseModelContent('"text"')).toThrow(LlmParseError);
  });
});
