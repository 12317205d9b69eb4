export * from './interfaces';
export * from './router-options';
export * from './regex-guard';
export * from './matcher';
