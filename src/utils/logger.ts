import pino, { Logger } from 'pino';

export type { Logger };

/**
 * Creates the process logger. API keys and bearer tokens are redacted
 * wherever they appear in logged objects.
 */
export function createLogger(level = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({
    name: 'kids-weather',
    level,
    redact: {
      paths: [
        'appid',
        'apiKey',
        '*.apiKey',
        '*.appid',
        'headers.Authorization',
        '*.headers.Authorization',
      ],
      censor: '[REDACTED]',
    },
  });
}

export function previewOf(text: string, length = 200): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}
