export * from './view';
export * from './interfaces';
export * from './handlers';
export * from './format-handler-registry';
export * from './format-negotiator';
export * from './response-builder';
