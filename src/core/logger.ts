import pino, { Logger } from 'pino';

export { Logger };

const defaultLevel = (): string => {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
};

export const createLogger = (name = 'advisory-engine'): Logger =>
  pino({
    name,
    level: defaultLevel(),
    base: undefined
  });

export const silentLogger = (): Logger => pino({ level: 'silent' });
