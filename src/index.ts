// Library entry point for the inventory deployer
export * from './types';
export * from './errors';
export * from './config';
export * from './state';
export * from './logging';
export * from './provisioning';
export * from './orchestration';
