import pino from 'pino';

const REDACTED_PATHS = [
  'authorization',
  'Authorization',
  'apiKey',
  'password',
  'sharedSecret',
  'downloadUrl',
  '*.downloadUrl',
];

// JSON lines for CloudWatch; Lambda stamps the time itself
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  timestamp: false,
  formatters: {
    level: (label) => ({ level: label }),
  },
  redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
});

export type Logger = typeof logger;

export function createRequestLogger(requestId: string) {
  return logger.child({ requestId });
}
