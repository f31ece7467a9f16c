import axios, { AxiosInstance } from 'axios';
import { Logger } from 'pino';
import { ICompleteLlmProvider } from '@/config/settings';
import {
  ChatCompletionResponseSchema,
  LLM_METADATA_KEYS,
  LlmOutputSchema,
  LlmResult,
} from '@/schemas/llm.schema';
import { LlmContext } from '@/services/interfaces/llm.client.interface';
import { normalizeContent } from '@/utils/content-normalizer';
import { LlmParseError, ProviderError, toProviderError } from '@/utils/errors';
import { previewOf } from '@/utils/logger';

// Generation is slow; the socket timeout is deliberately long.
export const LLM_TIMEOUT_MS = 200_000;

const METADATA_KEYS: ReadonlySet<string> = new Set(LLM_METADATA_KEYS);

export interface IInvocation {
  provider: ICompleteLlmProvider;
  model: string;
  apiKey: string;
}

/** Serializes non-string context without the client's own metadata keys. */
export function serializeContext(context: LlmContext): string {
  if (typeof context === 'string') {
    return context;
  }
  return JSON.stringify(context, (key, value: unknown) =>
    METADATA_KEYS.has(key) ? undefined : value,
  );
}

export function buildRequestBody(
  context: LlmContext,
  systemPrompt: string,
  model: string,
  supportsJsonMode: boolean,
) {
  return {
    model,
    messages: [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: serializeContext(context) },
    ],
    stream: false,
    ...(supportsJsonMode ? { response_format: { type: 'json_object' } } : {}),
  };
}

/** Parses normalized model output; anything but a JSON object is rejected. */
export function parseModelContent(raw: string) {
  const content = normalizeContent(raw);
  let decoded: unknown;
  try {
    decoded = JSON.parse(content);
  } catch (error) {
    throw new LlmParseError(
      `LLM returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      previewOf(content),
    );
  }
  const parsed = LlmOutputSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new LlmParseError('LLM returned JSON that is not a report object', previewOf(content));
  }
  return parsed.data;
}

/** One OpenAI-compatible chat completion call against a single provider. */
export class ChatCompletionProvider {
  constructor(
    private readonly logger: Logger,
    private readonly http: AxiosInstance = axios.create({ timeout: LLM_TIMEOUT_MS }),
  ) {}

  async invoke(
    { provider, model, apiKey }: IInvocation,
    context: LlmContext,
    systemPrompt: string,
  ): Promise<LlmResult> {
    const target = `${provider.label} LLM`;
    const body = buildRequestBody(context, systemPrompt, model, provider.supportsJsonMode);

    let data: unknown;
    try {
      const response = await this.http.post<unknown>(provider.apiUrl, body, {
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
      });
      data = response.data;
    } catch (error) {
      throw toProviderError(error, target);
    }

    const completion = ChatCompletionResponseSchema.safeParse(data);
    if (!completion.success) {
      throw new ProviderError('response', target, 'LLM response did not include choices');
    }

    const raw = completion.data.choices[0].message.content;
    const output = this.parse(raw, provider.label, model);

    this.logger.debug({ provider: provider.label, model }, 'LLM response parsed');
    return {
      ...output,
      _raw_llm_response: raw,
      _model_used: model,
      _provider_label: provider.label,
    };
  }

  private parse(raw: string, label: string, model: string) {
    try {
      return parseModelContent(raw);
    } catch (error) {
      if (error instanceof LlmParseError) {
        this.logger.error({ provider: label, model, preview: error.preview }, 'LLM output was not valid JSON');
      }
      throw error;
    }
  }
}
