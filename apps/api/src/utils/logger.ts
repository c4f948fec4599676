import pino, { type LoggerOptions } from 'pino';

function defaultLevel(nodeEnv: string | undefined): string {
  if (nodeEnv === 'test') return 'silent';
  if (nodeEnv === 'development') return 'debug';
  return 'info';
}

/**
 * Logger options shared by the standalone logger and Fastify's request logger,
 * so both write with the same level and formatting.
 */
export function createLoggerOptions(
  nodeEnv: string | undefined = process.env.NODE_ENV,
  level: string | undefined = process.env.LOG_LEVEL
): LoggerOptions {
  return {
    level: level || defaultLevel(nodeEnv),
    transport: nodeEnv === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname,reqId,res,responseTime',
        messageFormat: '{msg}',
        translateTime: 'HH:MM:ss UTC',
      },
    } : undefined,
  };
}

export const logger = pino(createLoggerOptions());
