import log4js from 'log4js';
import { Logger } from './types';

let configuredLevel: string | null = null;

export function configureLogging(level: string): void {
  if (configuredLevel === level) return;

  log4js.configure({
    appenders: {
      console: {
        type: 'console',
        layout: { type: 'pattern', pattern: '%d %p %c - %m' },
      },
    },
    categories: {
      default: { appenders: ['console'], level },
    },
  });
  configuredLevel = level;
}

export function getLogger(name: string): Logger {
  return log4js.getLogger(name);
}
