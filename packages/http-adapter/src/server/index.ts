export * from './node-request';
export * from './node-response-sink';
export * from './switchyard-http-server';
