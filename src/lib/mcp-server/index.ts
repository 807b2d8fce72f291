export * from './connection';
export * from './registry';
export * from './server';
export * from './types';
