import pino from 'pino';

// stdout carries the report; structured logs go to stderr.
export const logger = pino(
  {
    name: 'install-guide-check',
    level: process.env['LOG_LEVEL'] ?? (process.env['NODE_ENV'] === 'test' ? 'silent' : 'info'),
  },
  pino.destination({ dest: 2, sync: true })
);
