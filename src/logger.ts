import { pino } from 'pino';

export const logger = pino({
  name: 'ciao-bat',
  level: process.env['LOG_LEVEL'] ?? 'info'
});
