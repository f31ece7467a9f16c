import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { ISettings } from '@/config/settings';
import { InteractionLogRepository } from '@/repositories/interaction-log.repository';
import { LlmClient } from '@/services/llm.client';
import { OpenWeatherProvider } from '@/services/providers/openweather.provider';
import { ReplayService } from '@/services/replay.service';
import { ReportService } from '@/services/report.service';
import { SqliteCache } from '@/utils/cache';
import { Logger, createLogger } from '@/utils/logger';

export interface IServices {
  settings: ISettings;
  logger: Logger;
  reportService: ReportService;
  replayService: ReplayService;
  interactionLog: InteractionLogRepository;
  close(): void;
}

function openDatabase(file: string): Database.Database {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  return new Database(file);
}

// Composition root: one shared cache, one interaction log.
export function createServices(
  settings: ISettings,
  logger: Logger = createLogger(settings.logLevel),
): IServices {
  const cacheDb = openDatabase(settings.paths.cacheDb);
  const logDb = openDatabase(settings.paths.llmLogDb);
  const cache = new SqliteCache(cacheDb);
  const purged = cache.purgeExpired();
  if (purged > 0) {
    logger.debug({ purged }, 'Purged expired cache entries');
  }

  const weatherProvider = new OpenWeatherProvider(settings.weather, cache, logger);
  const llmClient = new LlmClient(settings.llm, cache, logger);
  const interactionLog = new InteractionLogRepository(logDb);

  return {
    settings,
    logger,
    reportService: new ReportService({
      settings,
      weatherProvider,
      llmClient,
      interactionLogger: interactionLog,
      logger,
    }),
    replayService: new ReplayService(settings, interactionLog, llmClient, logger),
    interactionLog,
    close() {
      cacheDb.close();
      logDb.close();
    },
  };
}
