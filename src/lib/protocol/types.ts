/* istanbul ignore file */
/**
 * Protocol types and validation schemas.
 * Schemas are the source of truth - types are inferred from them.
 */

import { z } from 'zod';

export const JSONRPC_VERSION = '2.0';
export const LATEST_PROTOCOL_VERSION = '2025-03-26';
export const SUPPORTED_PROTOCOL_VERSIONS: readonly string[] = [LATEST_PROTOCOL_VERSION, '2024-11-05'];

export enum ErrorCode {
    // JSON-RPC 2.0
    PARSE_ERROR = -32700,
    INVALID_REQUEST = -32600,
    METHOD_NOT_FOUND = -32601,
    INVALID_PARAMS = -32602,
    INTERNAL_ERROR = -32603,
    // capability lookups
    TOOL_NOT_FOUND = -32000,
    RESOURCE_NOT_FOUND = -32001,
    PROMPT_NOT_FOUND = -32002,
    // lifecycle and handlers
    NOT_INITIALIZED = -32003,
    APPLICATION_ERROR = -32010,
    REQUEST_CANCELLED = -32800,
}

export const Method = {
    INITIALIZE: 'initialize',
    INITIALIZED: 'notifications/initialized',
    PING: 'ping',
    TOOLS_LIST: 'tools/list',
    TOOLS_CALL: 'tools/call',
    RESOURCES_LIST: 'resources/list',
    RESOURCES_TEMPLATES_LIST: 'resources/templates/list',
    RESOURCES_READ: 'resources/read',
    RESOURCES_SUBSCRIBE: 'resources/subscribe',
    RESOURCES_UNSUBSCRIBE: 'resources/unsubscribe',
    PROMPTS_LIST: 'prompts/list',
    PROMPTS_GET: 'prompts/get',
    LOGGING_SET_LEVEL: 'logging/setLevel',
    ROOTS_LIST: 'roots/list',
    SAMPLING_CREATE_MESSAGE: 'sampling/createMessage',
    // notifications
    CANCELLED: 'notifications/cancelled',
    PROGRESS: 'notifications/progress',
    MESSAGE: 'notifications/message',
    TOOLS_LIST_CHANGED: 'notifications/tools/list_changed',
    RESOURCES_LIST_CHANGED: 'notifications/resources/list_changed',
    RESOURCES_UPDATED: 'notifications/resources/updated',
    PROMPTS_LIST_CHANGED: 'notifications/prompts/list_changed',
} as const;

export type MethodName = (typeof Method)[keyof typeof Method];

// JSON-RPC envelopes

export const requestIdSchema = z.union([z.string(), z.number()]);
export type RequestId = z.infer<typeof requestIdSchema>;

export const paramsSchema = z.record(z.unknown());
export type Params = z.infer<typeof paramsSchema>;

export const errorObjectSchema = z.object({
    code: z.number().int(),
    message: z.string(),
    data: z.unknown().optional(),
});
export type ErrorObject = z.infer<typeof errorObjectSchema>;

export const requestSchema = z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: requestIdSchema,
    method: z.string().min(1),
    params: paramsSchema.optional(),
});

export const notificationSchema = z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    method: z.string().min(1),
    params: paramsSchema.optional(),
});

// any JSON value, but present
const jsonValueSchema = z.custom<NonNullable<unknown> | null>((value) => value !== undefined, 'Required');

export const responseSchema = z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: requestIdSchema,
    result: jsonValueSchema,
});

export const errorResponseSchema = z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: requestIdSchema.nullable(),
    error: errorObjectSchema,
});

export interface JSONRPCRequest {
    jsonrpc: typeof JSONRPC_VERSION;
    id: RequestId;
    method: string;
    params?: Params;
}

export interface JSONRPCNotification {
    jsonrpc: typeof JSONRPC_VERSION;
    method: string;
    params?: Params;
}

export interface JSONRPCResponse {
    jsonrpc: typeof JSONRPC_VERSION;
    id: RequestId;
    result: unknown;
}

export interface JSONRPCErrorResponse {
    jsonrpc: typeof JSONRPC_VERSION;
    id: RequestId | null;
    error: ErrorObject;
}

export type Envelope = JSONRPCRequest | JSONRPCNotification | JSONRPCResponse | JSONRPCErrorResponse;
export type Reply = JSONRPCResponse | JSONRPCErrorResponse;

export function isRequest(msg: Envelope): msg is JSONRPCRequest {
    return 'method' in msg && 'id' in msg;
}

export function isNotification(msg: Envelope): msg is JSONRPCNotification {
    return 'method' in msg && !('id' in msg);
}

export function isResponse(msg: Envelope): msg is JSONRPCResponse {
    return 'result' in msg && !('method' in msg);
}

export function isErrorResponse(msg: Envelope): msg is JSONRPCErrorResponse {
    return 'error' in msg && !('method' in msg);
}

// Handshake

export const implementationSchema = z.object({
    name: z.string(),
    version: z.string(),
});
export type Implementation = z.infer<typeof implementationSchema>;

const listChangedSchema = z.object({ listChanged: z.boolean().optional() }).passthrough();

export const serverCapabilitiesSchema = z
    .object({
        tools: listChangedSchema.optional(),
        resources: listChangedSchema.extend({ subscribe: z.boolean().optional() }).optional(),
        prompts: listChangedSchema.optional(),
        logging: z.record(z.unknown()).optional(),
        experimental: z.record(z.unknown()).optional(),
    })
    .passthrough();
export type ServerCapabilities = z.infer<typeof serverCapabilitiesSchema>;

export const clientCapabilitiesSchema = z
    .object({
        roots: listChangedSchema.optional(),
        sampling: z.record(z.unknown()).optional(),
        experimental: z.record(z.unknown()).optional(),
    })
    .passthrough();
export type ClientCapabilities = z.infer<typeof clientCapabilitiesSchema>;

export const initializeParamsSchema = z.object({
    protocolVersion: z.string(),
    capabilities: clientCapabilitiesSchema,
    clientInfo: implementationSchema,
});
export type InitializeParams = z.infer<typeof initializeParamsSchema>;

export const initializeResultSchema = z.object({
    protocolVersion: z.string(),
    capabilities: serverCapabilitiesSchema,
    serverInfo: implementationSchema,
    instructions: z.string().optional(),
});
export type InitializeResult = z.infer<typeof initializeResultSchema>;

// Content

export const textContentSchema = z.object({
    type: z.literal('text'),
    text: z.string(),
});

export const imageContentSchema = z.object({
    type: z.literal('image'),
    data: z.string(),
    mimeType: z.string(),
});

export const resourceContentsSchema = z.object({
    uri: z.string(),
    mimeType: z.string().optional(),
    text: z.string().optional(),
    blob: z.string().optional(),
});
export type ResourceContents = z.infer<typeof resourceContentsSchema>;

export const embeddedResourceSchema = z.object({
    type: z.literal('resource'),
    resource: resourceContentsSchema,
});

export const contentSchema = z.discriminatedUnion('type', [textContentSchema, imageContentSchema, embeddedResourceSchema]);
export type Content = z.infer<typeof contentSchema>;

// Tools

export const jsonSchemaObject = z.object({ type: z.literal('object') }).passthrough();
export type InputSchema = z.infer<typeof jsonSchemaObject>;

export const toolDefinitionSchema = z.object({
    name: z.string(),
    description: z.string().optional(),
    inputSchema: jsonSchemaObject,
});
export type ToolDefinition = z.infer<typeof toolDefinitionSchema>;

export const toolResultSchema = z.object({
    content: z.array(contentSchema),
    isError: z.boolean().optional(),
});
export type ToolResult = z.infer<typeof toolResultSchema>;

export const metaSchema = z
    .object({
        progressToken: requestIdSchema.optional(),
    })
    .passthrough();

export const toolCallParamsSchema = z.object({
    name: z.string(),
    arguments: z.record(z.unknown()).optional(),
    // biome-ignore lint/style/useNamingConvention: _meta is part of the protocol
    _meta: metaSchema.optional(),
});
export type ToolCallParams = z.infer<typeof toolCallParamsSchema>;

export const listToolsResultSchema = z.object({ tools: z.array(toolDefinitionSchema) });

// Resources

export const resourceDefinitionSchema = z.object({
    uri: z.string(),
    name: z.string(),
    description: z.string().optional(),
    mimeType: z.string().optional(),
});
export type ResourceDefinition = z.infer<typeof resourceDefinitionSchema>;

export const resourceTemplateSchema = z.object({
    uriTemplate: z.string(),
    name: z.string(),
    description: z.string().optional(),
    mimeType: z.string().optional(),
});
export type ResourceTemplate = z.infer<typeof resourceTemplateSchema>;

export const resourceReadParamsSchema = z.object({
    uri: z.string(),
    // biome-ignore lint/style/useNamingConvention: _meta is part of the protocol
    _meta: metaSchema.optional(),
});
export type ResourceReadParams = z.infer<typeof resourceReadParamsSchema>;

export const resourceReadResultSchema = z.object({ contents: z.array(resourceContentsSchema) });
export type ResourceReadResult = z.infer<typeof resourceReadResultSchema>;

export const subscribeParamsSchema = z.object({ uri: z.string() });

export const listResourcesResultSchema = z.object({ resources: z.array(resourceDefinitionSchema) });
export const listResourceTemplatesResultSchema = z.object({ resourceTemplates: z.array(resourceTemplateSchema) });

// Prompts

export const promptArgumentSchema = z.object({
    name: z.string(),
    description: z.string().optional(),
    required: z.boolean().optional(),
});
export type PromptArgument = z.infer<typeof promptArgumentSchema>;

export const promptDefinitionSchema = z.object({
    name: z.string(),
    description: z.string().optional(),
    arguments: z.array(promptArgumentSchema).optional(),
});
export type PromptDefinition = z.infer<typeof promptDefinitionSchema>;

export const promptMessageSchema = z.object({
    role: z.enum(['user', 'assistant']),
    content: contentSchema,
});
export type PromptMessage = z.infer<typeof promptMessageSchema>;

export const promptResultSchema = z.object({
    description: z.string().optional(),
    messages: z.array(promptMessageSchema),
});
export type PromptResult = z.infer<typeof promptResultSchema>;

export const promptGetParamsSchema = z.object({
    name: z.string(),
    arguments: z.record(z.string()).optional(),
    // biome-ignore lint/style/useNamingConvention: _meta is part of the protocol
    _meta: metaSchema.optional(),
});
export type PromptGetParams = z.infer<typeof promptGetParamsSchema>;

export const listPromptsResultSchema = z.object({ prompts: z.array(promptDefinitionSchema) });

// Logging

export const loggingLevelSchema = z.enum(['debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency']);
export type LoggingLevel = z.infer<typeof loggingLevelSchema>;

export const setLevelParamsSchema = z.object({ level: loggingLevelSchema });

export const logMessageParamsSchema = z.object({
    level: loggingLevelSchema,
    logger: z.string().optional(),
    data: z.unknown(),
});
export type LogMessageParams = z.infer<typeof logMessageParamsSchema>;

// Notifications

export const cancelledParamsSchema = z.object({
    requestId: requestIdSchema,
    reason: z.string().optional(),
});
export type CancelledParams = z.infer<typeof cancelledParamsSchema>;

export const progressParamsSchema = z.object({
    progressToken: requestIdSchema,
    progress: z.number(),
    total: z.number().optional(),
    message: z.string().optional(),
});
export type ProgressParams = z.infer<typeof progressParamsSchema>;

export const resourceUpdatedParamsSchema = z.object({ uri: z.string() });

// Roots (server-initiated)

export const rootSchema = z.object({
    uri: z.string(),
    name: z.string().optional(),
});
export type Root = z.infer<typeof rootSchema>;

export const listRootsResultSchema = z.object({ roots: z.array(rootSchema) });
export type ListRootsResult = z.infer<typeof listRootsResultSchema>;
