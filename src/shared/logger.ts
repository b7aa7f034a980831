import pino from 'pino';

const env = process.env['NODE_ENV'];
const pretty = env !== 'production' && env !== 'test' && process.env['JSON_LOGS'] !== 'true';

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport: pretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
  redact: {
    paths: ['api_token', 'apiToken', 'token', '*.api_token', 'destination.api_token'],
    censor: '***REDACTED***',
  },
});
