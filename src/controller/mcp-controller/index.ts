/**
 * MCP Controller - demo capabilities served by the CLI
 *
 * Each capability group is defined in its own file.
 * Add new ones to register.ts.
 */

export { registerOwnCapabilities } from './register';
export { SERVER_INFO_URI } from './resources';
