export * from './interfaces';
export * from './kernel-events';
export * from './event-dispatcher';
