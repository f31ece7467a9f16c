import { createApp } from '@/app';
import { loadSettings } from '@/config/settings';
import { createServices } from '@/container';

const settings = loadSettings();
const services = createServices(settings);
const { logger } = services;

const app = createApp(services);

const server = app.listen(settings.port, () => {
  logger.info(`Server running at http://localhost:${settings.port}`);
});

const shutdown = () => {
  server.close(() => {
    services.close();
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
