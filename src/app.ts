import express from 'express';
import morgan from 'morgan';
import { Logger } from 'pino';
import { createWeatherRoutes } from '@/routes/weather.routes';
import { WeatherController } from '@/controllers/weather.controller';
import { ReportService } from '@/services/report.service';
import { createErrorHandler } from '@/middleware/error.middleware';

export interface IAppDeps {
  reportService: ReportService;
  logger: Logger;
}

export const createApp = ({ reportService, logger }: IAppDeps) => {
  const app = express();

  // Middleware
  app.use(
    morgan('dev', {
      stream: { write: (line: string) => logger.info(line.trim()) },
    }),
  );
  app.use(express.json());

  // Routes
  app.use(createWeatherRoutes(new WeatherController(reportService)));

  // Health check
  app.get('/health-check', (req, res) => {
    res.send('up and running!');
  });

  // Error handling
  app.use(createErrorHandler(logger));

  return app;
};
