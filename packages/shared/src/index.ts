// @plugin-atlas/shared public API
export * from './constants/index';
export * from './types/index';
export * from './utils/index';
export * from './errors';
