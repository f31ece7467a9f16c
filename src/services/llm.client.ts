import { Logger } from 'pino';
import {
  ICompleteLlmProvider,
  ILlmProviderSettings,
  isProviderComplete,
  requireComplete,
} from '@/config/settings';
import { LlmResult, LlmResultSchema } from '@/schemas/llm.schema';
import {
  IGenerateOptions,
  ILlmClient,
  LlmContext,
} from '@/services/interfaces/llm.client.interface';
import {
  ChatCompletionProvider,
  IInvocation,
} from '@/services/providers/chat-completion.provider';
import { ICache } from '@/utils/cache';
import { makeCacheKey } from '@/utils/cache-key';
import { IProviderFailure, LlmFallbackError } from '@/utils/errors';

export interface ILlmClientSettings {
  primary: ILlmProviderSettings;
  fallback?: ILlmProviderSettings;
  cacheTtlSeconds: number;
}

// Resolved lazily so an incomplete fallback only fails when it is reached.
type Attempt = { label: string; resolve: () => IInvocation };

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class LlmClient implements ILlmClient {
  constructor(
    private readonly settings: ILlmClientSettings,
    private readonly cache: ICache<unknown> | null,
    private readonly logger: Logger,
    private readonly provider: ChatCompletionProvider = new ChatCompletionProvider(logger),
  ) {}

  async generate(
    context: LlmContext,
    systemPrompt: string,
    options: IGenerateOptions = {},
  ): Promise<LlmResult> {
    const primary = requireComplete(this.settings.primary);

    if (!options.refresh) {
      const cached = await this.lookup(context, systemPrompt, primary, options.modelOverride);
      if (cached) {
        return cached;
      }
    }

    const result = await this.invokeChain(this.attempts(primary, options), context, systemPrompt);
    await this.store(context, systemPrompt, result);
    return result;
  }

  private async invokeChain(
    attempts: Attempt[],
    context: LlmContext,
    systemPrompt: string,
  ): Promise<LlmResult> {
    const failures: IProviderFailure[] = [];

    for (const attempt of attempts) {
      try {
        const invocation = attempt.resolve();
        const result = await this.provider.invoke(invocation, context, systemPrompt);
        if (failures.length > 0) {
          this.logger.info({ model: invocation.model }, 'Fallback LLM succeeded');
        }
        return result;
      } catch (error) {
        const failure = toError(error);
        this.logger.warn({ provider: attempt.label, err: failure }, 'LLM provider failed');
        failures.push({ label: attempt.label, error: failure });
      }
    }

    if (failures.length === 1) {
      throw failures[0].error;
    }
    throw new LlmFallbackError(failures);
  }

  // Cache write failures are logged, never raised.
  private async store(context: LlmContext, systemPrompt: string, result: LlmResult): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.set(
        makeCacheKey('llm', [context, systemPrompt, result._model_used]),
        result,
        this.settings.cacheTtlSeconds,
      );
    } catch (error) {
      this.logger.warn({ err: toError(error), model: result._model_used }, 'Failed to cache LLM result');
    }
  }

  private attempts(primary: ICompleteLlmProvider, options: IGenerateOptions): Attempt[] {
    const chain: Attempt[] = [
      {
        label: primary.label,
        resolve: () => ({
          provider: primary,
          model: options.modelOverride ?? primary.model,
          apiKey: options.apiKeyOverride ?? primary.apiKey,
        }),
      },
    ];
    const { fallback } = this.settings;
    if (fallback) {
      chain.push({
        label: fallback.label,
        resolve: () => {
          const complete = requireComplete(fallback);
          return { provider: complete, model: complete.model, apiKey: complete.apiKey };
        },
      });
    }
    return chain;
  }

  private async lookup(
    context: LlmContext,
    systemPrompt: string,
    primary: ICompleteLlmProvider,
    modelOverride?: string,
  ): Promise<LlmResult | null> {
    if (!this.cache) return null;

    const models = [modelOverride ?? primary.model];
    const { fallback } = this.settings;
    if (!modelOverride && fallback?.model && isProviderComplete(fallback)) {
      models.push(fallback.model);
    }

    for (const model of models) {
      const hit = await this.cache.get(makeCacheKey('llm', [context, systemPrompt, model]));
      if (hit === null) continue;
      const parsed = LlmResultSchema.safeParse(hit);
      if (parsed.success) {
        this.logger.debug({ model }, 'LLM cache hit');
        return parsed.data;
      }
    }
    return null;
  }
}
