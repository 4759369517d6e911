import { pino } from 'pino';

// Structured JSON logs; batch runs pipe these to a file or collector
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'packets-engine' },
  formatters: {
    level: (label) => ({ level: label }),
  },
  // Cache payloads can carry contact details for delegation staff
  redact: {
    paths: ['email', 'phone', 'contact.email', 'contact.phone'],
    censor: '[REDACTED]',
  },
});

// Child logger scoped to one module
export function createLogger(module: string) {
  return logger.child({ module });
}

// Child logger scoped to one entity within a generation
export function createEntityLogger(entityId: string, generationId?: string) {
  return logger.child({
    entityId,
    ...(generationId && { generationId }),
  });
}

export type Logger = typeof logger;
