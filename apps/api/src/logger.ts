import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export const createLogger = (level: LevelWithSilent = 'info'): Logger =>
  pino({
    name: 'roster-clean',
    level,
    timestamp: pino.stdTimeFunctions.isoTime
  });

export const silentLogger: Logger = createLogger('silent');
