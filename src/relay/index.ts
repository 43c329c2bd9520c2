// pattern: Functional Core

export type { ChatResponse, StreamChunk, HealthStatus, ConnectionCheck, Relay } from './types.js';
export { MAX_TOOL_ROUNDS_REASON, RELAY_VERSION, ProviderNotConfiguredError } from './types.js';
export { ChatMessageSchema, ChatRequestSchema, type ChatRequest, type ChatRequestInput } from './schema.js';
export { createRelay, type RelayDependencies } from './relay.js';
