import Database from 'better-sqlite3';
import {
  IInteractionEntry,
  IInteractionLogger,
  IInteractionRecord,
} from '@/services/interfaces/interaction-logger.interface';
import { NOT_AVAILABLE } from '@/utils/weather-descriptions';

const TABLE = 'llm_interactions';

// Column name → declaration used when an older table is missing it.
const COLUMNS: ReadonlyArray<[string, string]> = [
  ['timestamp', 'DATETIME'],
  ['location_name', 'TEXT'],
  ['weather_input', 'TEXT'],
  ['llm_context', 'TEXT'],
  ['system_prompt', 'TEXT'],
  ['model_used', 'TEXT'],
  ['llm_output', 'TEXT'],
  ['description', 'TEXT'],
  ['source', 'TEXT'],
];

interface IInteractionRow {
  id: number;
  timestamp: string;
  location_name: string | null;
  weather_input: string | null;
  llm_context: string | null;
  system_prompt: string | null;
  model_used: string | null;
  llm_output: string | null;
  description: string | null;
  source: string | null;
}

type InsertParams = Omit<IInteractionRow, 'id' | 'timestamp'>;

export class InteractionLogRepository implements IInteractionLogger {
  constructor(private readonly db: Database.Database) {}

  /** Creates the table, then adds any column an older database lacks. */
  ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${TABLE} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp DATETIME DEFAULT CURRENT_TIMESTAMP,
        location_name TEXT,
        weather_input TEXT,
        llm_context TEXT,
        system_prompt TEXT,
        model_used TEXT,
        llm_output TEXT,
        description TEXT,
        source TEXT
      )
    `);

    const existing = new Set(
      this.db
        .prepare<[], { name: string }>(`PRAGMA table_info(${TABLE})`)
        .all()
        .map((column) => column.name),
    );
    for (const [name, type] of COLUMNS) {
      if (!existing.has(name)) {
        this.db.exec(`ALTER TABLE ${TABLE} ADD COLUMN ${name} ${type}`);
      }
    }
  }

  log(entry: IInteractionEntry): number {
    const result = this.db
      .prepare<InsertParams>(
        `INSERT INTO ${TABLE} (
          location_name, weather_input, llm_context, system_prompt,
          model_used, llm_output, description, source
        ) VALUES (
          @location_name, @weather_input, @llm_context, @system_prompt,
          @model_used, @llm_output, @description, @source
        )`,
      )
      .run({
        location_name: entry.locationName ?? NOT_AVAILABLE,
        weather_input: JSON.stringify(entry.weatherInput),
        llm_context: entry.llmContext,
        system_prompt: entry.systemPrompt,
        model_used: entry.modelUsed,
        llm_output: JSON.stringify(entry.llmOutput),
        description: entry.description,
        source: entry.source,
      });
    return Number(result.lastInsertRowid);
  }

  findById(id: number): IInteractionRecord | null {
    const row = this.db
      .prepare<[number], IInteractionRow>(`SELECT * FROM ${TABLE} WHERE id = ?`)
      .get(id);
    if (!row) return null;
    return {
      id: row.id,
      timestamp: row.timestamp,
      locationName: row.location_name,
      weatherInput: row.weather_input,
      llmContext: row.llm_context,
      systemPrompt: row.system_prompt,
      modelUsed: row.model_used,
      llmOutput: row.llm_output,
      description: row.description,
      source: row.source,
    };
  }
}
