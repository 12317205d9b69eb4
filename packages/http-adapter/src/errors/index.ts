export * from './http.errors';
export * from './route-table.errors';
export * from './resolution.errors';
export * from './request-aborted.error';
export * from './error-renderer';
