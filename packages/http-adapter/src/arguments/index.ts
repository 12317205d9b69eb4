export * from './types';
export * from './interfaces';
export * from './param';
export * from './coercion';
export * from './value-readers';
export * from './constraint-validator';
export * from './derived-value-providers';
export * from './argument-resolver';
