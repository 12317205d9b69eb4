export * from './output';
export * from './writers';
export * from './request';
export * from './response';
export * from './streamed-response';
export * from './json-response';
export * from './redirect-response';
