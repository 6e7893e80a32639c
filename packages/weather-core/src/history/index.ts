export * from './types';
export * from './sqlite-store';
export * from './memory-store';
