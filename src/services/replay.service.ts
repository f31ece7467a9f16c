import { readFile } from 'fs/promises';
import { Logger } from 'pino';
import { ISettings, temperatureSymbol } from '@/config/settings';
import { LlmResult } from '@/schemas/llm.schema';
import { WeatherSnapshotSchema } from '@/schemas/weather.schema';
import {
  IInteractionLogger,
  IInteractionRecord,
} from '@/services/interfaces/interaction-logger.interface';
import { ILlmClient } from '@/services/interfaces/llm.client.interface';
import { NotFoundError, ValidationError, errorMessage } from '@/utils/errors';
import { isFile } from '@/utils/files';
import { formatForLlm } from '@/utils/weather-formatter';

export interface IReplayOptions {
  logId: number;
  prompt?: string; // prompt text or a path to a prompt file
  model?: string;
}

export type PromptSource = 'original' | 'file' | 'text';

export interface IReplayOutcome {
  record: IInteractionRecord;
  llmContext: string;
  systemPrompt: string;
  promptSource: PromptSource;
  model: string;
  result: LlmResult;
}

/** Re-runs a logged interaction against the model without refetching weather. */
export class ReplayService {
  constructor(
    private readonly settings: ISettings,
    private readonly interactionLogger: IInteractionLogger,
    private readonly llmClient: ILlmClient,
    private readonly logger: Logger,
  ) {}

  async replay({ logId, prompt, model }: IReplayOptions): Promise<IReplayOutcome> {
    this.interactionLogger.ensureSchema();
    const record = this.interactionLogger.findById(logId);
    if (!record) {
      throw new NotFoundError(`No logged interaction with id ${logId}`);
    }

    const llmContext = this.contextOf(record);
    const { systemPrompt, promptSource } = await this.promptFor(record, prompt);
    const modelToUse = model ?? record.modelUsed;
    if (!modelToUse) {
      throw new ValidationError(`Interaction ${logId} has no model recorded; pass one explicitly`);
    }

    this.logger.info({ logId, model: modelToUse, promptSource }, 'Replaying LLM interaction');
    const result = await this.llmClient.generate(llmContext, systemPrompt, {
      modelOverride: modelToUse,
      refresh: true,
    });
    return { record, llmContext, systemPrompt, promptSource, model: modelToUse, result };
  }

  // Rows logged before the context column existed only carry the weather.
  private contextOf(record: IInteractionRecord): string {
    if (record.llmContext) {
      return record.llmContext;
    }
    if (!record.weatherInput) {
      throw new ValidationError(`Interaction ${record.id} has neither context nor weather input`);
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(record.weatherInput);
    } catch (error) {
      throw new ValidationError(`Interaction ${record.id} has unreadable weather input: ${errorMessage(error)}`);
    }
    const parsed = WeatherSnapshotSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new ValidationError(`Interaction ${record.id} has unreadable weather input`);
    }
    return formatForLlm(parsed.data, null, {
      unitSymbol: temperatureSymbol(this.settings.weather.units),
    });
  }

  private async promptFor(
    record: IInteractionRecord,
    prompt?: string,
  ): Promise<{ systemPrompt: string; promptSource: PromptSource }> {
    if (prompt) {
      if (await isFile(prompt)) {
        return { systemPrompt: await readFile(prompt, 'utf8'), promptSource: 'file' };
      }
      return { systemPrompt: prompt, promptSource: 'text' };
    }
    return { systemPrompt: record.systemPrompt ?? '', promptSource: 'original' };
  }
}
