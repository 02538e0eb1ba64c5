export * from './reporter';
export * from './spinner-reporter';
