export * from './types';
export * from './schema';
export * from './file-state-store';
