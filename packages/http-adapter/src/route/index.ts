export * from './types';
export * from './interfaces';
export * from './action';
export * from './route-table';
export * from './compiled-routes';
