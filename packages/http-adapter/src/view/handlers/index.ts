export * from './json.handler';
export * from './text.handler';
