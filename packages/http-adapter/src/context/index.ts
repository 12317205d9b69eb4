export * from './attribute-bag';
export * from './request-context';
