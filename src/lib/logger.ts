import pino from 'pino';
import type { LoggingConfig } from '../types/index.js';

export type Logger = pino.Logger;

const REDACT_PATHS = [
  'accessKeyId',
  'secretAccessKey',
  'token',
  'authorization',
  '*.accessKeyId',
  '*.secretAccessKey',
  '*.token',
  '*.authorization',
  'headers.Authorization',
];

function baseOptions(level: string): pino.LoggerOptions {
  return {
    level,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    serializers: {
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '***',
    },
  };
}

export function createLogger(config: LoggingConfig, destination?: pino.DestinationStream): Logger {
  const options = baseOptions(config.level);

  if (destination) {
    return pino(options, destination);
  }

  // Use pino-pretty for development
  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  // Production: JSON logging to stdout for the container runtime
  return pino(options);
}

/**
 * Logger used before configuration is available, e.g. to report a
 * missing environment variable.
 */
export function createBootstrapLogger(destination?: pino.DestinationStream): Logger {
  const options = baseOptions('info');
  return destination ? pino(options, destination) : pino(options);
}
