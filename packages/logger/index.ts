export * from './src/interfaces';
export * from './src/types';
export * from './src/logger';
export * from './src/log-context';
export * from './src/constants';
export * from './src/transports/console';
