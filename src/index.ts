/**
 * @module mcp-engine
 *
 * Protocol engine for the Model Context Protocol: wire model and correlation,
 * transports, the server runtime and a reconnecting client.
 */

export * from './lib/mcp-client';
export * from './lib/mcp-server';
export * from './lib/protocol';
export * from './lib/transport';
export { registerOwnCapabilities, SERVER_INFO_URI } from './controller/mcp-controller';
