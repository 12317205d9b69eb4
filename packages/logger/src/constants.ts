import type { LogLevel } from './types';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'notice', 'warn', 'error', 'fatal'];
