import { LogLevel } from '@nestjs/common';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/** The given level and every level more severe; unknown names mean 'log'. */
export function logLevelsFrom(level: string): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level.toLowerCase());
  return LOG_LEVELS.slice(0, (index === -1 ? LOG_LEVELS.indexOf('log') : index) + 1);
}
