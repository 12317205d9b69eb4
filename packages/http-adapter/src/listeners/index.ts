export * from './error.listener';
export * from './compression.listener';
