import { Logger, LogLevel } from '../src/utils/logger';

/**
 * Logger that records messages instead of printing them
 */
export function captureLogger(level: LogLevel = LogLevel.DEBUG): { logger: Logger; messages: string[] } {
  const messages: string[] = [];
  const logger = new Logger({
    level,
    timestamp: false,
    sink: message => {
      messages.push(message);
    },
  });
  return { logger, messages };
}

export const quietLogger = new Logger({ level: LogLevel.ERROR, sink: () => undefined });
