import { WeatherSnapshot } from '@/schemas/weather.schema';

export interface IInteractionEntry {
  weatherInput: WeatherSnapshot;
  llmContext: string;
  systemPrompt: string;
  modelUsed: string;
  llmOutput: {
    raw_llm_response: string;
    parsed_result: Record<string, unknown>;
  };
  description: string;
  source: string;
  locationName?: string | null;
}

export interface IInteractionRecord {
  id: number;
  timestamp: string;
  locationName: string | null;
  weatherInput: string | null; // JSON text
  llmContext: string | null;
  systemPrompt: string | null;
  modelUsed: string | null;
  llmOutput: string | null; // JSON text
  description: string | null;
  source: string | null;
}

export interface IInteractionLogger {
  ensureSchema(): void;
  log(entry: IInteractionEntry): number;
  findById(id: number): IInteractionRecord | null;
}
