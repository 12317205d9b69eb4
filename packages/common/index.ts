export * from './src/types';
export * from './src/utils';
export * from './src/errors/switchyard.error';
