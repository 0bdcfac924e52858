import pino from 'pino';

/**
 * Service logger.
 *
 * HTTP request logs come from Fastify's own pino instance; this one is used by
 * the pipeline services so their logs carry the same JSON shape.
 */
export const logger = pino({
  name: 'knowledge-assistant-api',
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'knowledge-assistant-api' },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: { error: pino.stdSerializers.err },
});
