import { LlmResult } from '@/schemas/llm.schema';
import { JsonValue } from '@/utils/cache-key';

export type LlmContext = string | JsonValue;

export interface IGenerateOptions {
  modelOverride?: string;
  apiKeyOverride?: string;
  /** Skip the cache lookup and always call the model; the answer is still stored. */
  refresh?: boolean;
}

export interface ILlmClient {
  generate(
    context: LlmContext,
    systemPrompt: string,
    options?: IGenerateOptions,
  ): Promise<LlmResult>;
}
