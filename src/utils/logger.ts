/**
 * Structured logger (pino)
 *
 * Writes JSON lines to stdout, and to LOG_FILE as well when it is set.
 */

import pino from 'pino';
import { config } from '../config/index.js';

function createLogger(): pino.Logger {
  const level = config.app.env === 'test' ? 'silent' : config.logging.level;
  const options: pino.LoggerOptions = {
    name: config.app.name,
    level,
    base: { app: config.app.name, version: config.app.version },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { error: pino.stdSerializers.err },
  };

  if (!config.logging.file || level === 'silent') {
    return pino(options);
  }

  return pino(
    options,
    pino.multistream([
      { level, stream: process.stdout },
      { level, stream: pino.destination({ dest: config.logging.file, mkdir: true, sync: false }) },
    ])
  );
}

export const logger = createLogger();

export type Logger = pino.Logger;
