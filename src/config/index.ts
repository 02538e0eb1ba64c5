export * from './types';
export * from './loader';
export * from './validator';
export * from './naming';
