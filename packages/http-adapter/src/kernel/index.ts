export * from './interfaces';
export * from './http-kernel';
