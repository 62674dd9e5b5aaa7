import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

export const logger = pino({
  level,
  base: { service: 'support-turn-engine' },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  redact: {
    paths: ['contactEmail', '*.contactEmail', 'identifier', '*.identifier'],
    censor: '[EMAIL_REDACTED]',
  },
});
