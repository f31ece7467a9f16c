import { z } from 'zod';

// Models answer with either `{ "Monday": "..." }` or `["...", "..."]`.
export const DailyForecastsSchema = z.union([
  z.record(z.string()),
  z.array(z.string()),
]);

export const LlmOutputSchema = z
  .object({
    description: z.string().optional(),
    daily_forecasts: DailyForecastsSchema.optional(),
  })
  .passthrough();

export const ProviderLabelSchema = z.enum(['primary', 'fallback']);

export const LlmResultSchema = LlmOutputSchema.extend({
  _raw_llm_response: z.string(),
  _model_used: z.string(),
  _provider_label: ProviderLabelSchema,
});

export const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .min(1),
});

export const LLM_METADATA_KEYS = [
  '_raw_llm_response',
  '_model_used',
  '_provider_label',
] as const;

export type DailyForecasts = z.infer<typeof DailyForecastsSchema>;
export type LlmOutput = z.infer<typeof LlmOutputSchema>;
export type LlmResult = z.infer<typeof LlmResultSchema>;
export type ProviderLabel = z.infer<typeof ProviderLabelSchema>;
