import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { InteractionLogRepository } from '@/repositories/interaction-log.repository';
import { IInteractionEntry } from '@/services/interfaces/interaction-logger.interface';
import { buildSnapshot } from '../fixtures/snapshot';

const entry = (overrides: Partial<IInteractionEntry> = {}): IInteractionEntry => ({
  weatherInput: buildSnapshot(),
  llmContext: 'context text',
  systemPrompt: 'system prompt',
  modelUsed: 'primary-model',
  llmOutput: {
    raw_llm_response: '{"description":"Sunny!"}',
    parsed_result: { description: 'Sunny!', _model_used: 'primary-model' },
  },
  description: 'Sunny!',
  source: 'test',
  locationName: 'America/New_York',
  ...overrides,
});

const columnsOf = (db: Database.Database) =>
  db
    .prepare<[], { name: string }>('PRAGMA table_info(llm_interactions)')
    .all()
    .map((c) => c.name);

describe('InteractionLogRepository', () => {
  let db: Database.Database;
  let repository: InteractionLogRepository;

  beforeEach(() => {
    db = new Database(':memory:');
    repository = new InteractionLogRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('creates the table idempotently', () => {
    repository.ensureSchema();
    repository.ensureSchema();
    expect(columnsOf(db)).toEqual([
      'id',
      'timestamp',
      'location_name',
      'weather_input',
      'llm_context',
      'system_prompt',
      'model_used',
      'llm_output',
      'description',
      'source',
    ]);
  });

  it('adds columns missing from an older table without touching its rows', () => {
    db.exec(`
      CREATE TABLE llm_interactions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp DATETIME DEFAULT CURRENT_TIMESTAMP,
        weather_input TEXT,
        llm_output TEXT
      )
    `);
    db.prepare("INSERT INTO llm_interactions (weather_input, llm_output) VALUES ('{}', '{}')").run();

    repository.ensureSchema();

    expect(columnsOf(db)).toEqual([
      'id',
      'timestamp',
      'weather_input',
      'llm_output',
      'location_name',
      'llm_context',
      'system_prompt',
      'model_used',
      'description',
      'source',
    ]);
    expect(repository.findById(1)).toMatchObject({ id: 1, weatherInput: '{}', llmContext: null });
  });

  it('logs an interaction and reads it back', () => {
    repository.ensureSchema();
    const id = repository.log(entry());

    const record = repository.findById(id);

    expect(id).toBe(1);
    expect(record).toMatchObject({
      id: 1,
      locationName: 'America/New_York',
      llmContext: 'context text',
      systemPrompt: 'system prompt',
      modelUsed: 'primary-model',
      description: 'Sunny!',
      source: 'test',
    });
    expect(JSON.parse(record?.weatherInput ?? 'null')).toEqual(buildSnapshot());
    expect(JSON.parse(record?.llmOutput ?? 'null')).toEqual({
      raw_llm_response: '{"description":"Sunny!"}',
      parsed_result: { description: 'Sunny!', _model_used: 'primary-model' },
    });
    expect(record?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });

  it('defaults the location to N/A', () => {
    repository.ensureSchema();
    const id = repository.log(entry({ locationName: null }));
    expect(repository.findById(id)?.locationName).toBe('N/A');
  });

  it('returns null for an unknown id', () => {
    repository.ensureSchema();
    expect(repository.findById(42)).toBeNull();
  });
});
