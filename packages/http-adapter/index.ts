export { StatusCodes } from 'http-status-codes';

export * from './src/enums';
export * from './src/errors';
export * from './src/http';
export * from './src/context';
export * from './src/route';
export * from './src/router';
export * from './src/arguments';
export * from './src/events';
export * from './src/invoker/action-invoker';
export * from './src/view';
export * from './src/listeners';
export * from './src/kernel';
export * from './src/config';
export * from './src/server';
