export * from './storage';
export * from './helpers';
export * from './observability';
export * from './config';
