/**
 * @file MCP client: reconnecting session and typed helpers
 */

export * from './client';
export * from './session';
export * from './types';
