export * from './base';
export * from './framing';
export * from './http';
export * from './memory';
export * from './stream';
export type * from './types';
export * from './websocket';
