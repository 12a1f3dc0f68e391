import { destination, pino, type LoggerOptions } from 'pino';
import { config } from '../config.js';

// stdout carries the CSV output, so every log line goes to stderr.
const options: LoggerOptions = { level: config.LOG_LEVEL };

export const logger =
  config.LOG_FORMAT === 'pretty'
    ? pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, destination: 2 },
        },
      })
    : pino(options, destination(2));
