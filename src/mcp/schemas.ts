/**
 * JSON schemas for inbound JSON-RPC messages and MCP results.
 */

import { Ajv, type ErrorObject } from 'ajv';
import type { JsonRpcNotification } from '../core/types.js';
import type {
  CallToolResult,
  InitializeResult,
  ListResourcesResult,
  ListToolsResult,
  ReadResourceResult,
} from './types.js';

const ajv = new Ajv({ strict: false });

/** Raw inbound response; `error` is left for dispatch to interpret. */
export interface ResponseEnvelope {
  jsonrpc?: unknown;
  id: string | number | null;
  result?: unknown;
  error?: unknown;
}

/** Any object carrying a string, number or null `id` is a response. */
export const isResponseEnvelope = ajv.compile<ResponseEnvelope>({
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: ['string', 'number', 'null'] },
  },
});

export const isJsonRpcNotification = ajv.compile<JsonRpcNotification>({
  type: 'object',
  required: ['method'],
  not: { required: ['id'] },
  properties: {
    method: { type: 'string' },
  },
});

export const isInitializeResult = ajv.compile<InitializeResult>({
  type: 'object',
  properties: {
    protocolVersion: { type: 'string' },
    capabilities: { type: 'object' },
    serverInfo: {
      type: 'object',
      required: ['name'],
      properties: {
        name: { type: 'string' },
        version: { type: 'string' },
      },
    },
    instructions: { type: 'string' },
    session_id: { type: 'string' },
    sessionId: { type: 'string' },
  },
});

export const isListToolsResult = ajv.compile<ListToolsResult>({
  type: 'object',
  required: ['tools'],
  properties: {
    tools: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name'],
        properties: { name: { type: 'string' } },
      },
    },
    nextCursor: { type: 'string' },
  },
});

export const isCallToolResult = ajv.compile<CallToolResult>({
  type: 'object',
  required: ['content'],
  properties: {
    content: {
      type: 'array',
      items: {
        type: 'object',
        required: ['type'],
        properties: { type: { type: 'string' }, text: { type: 'string' } },
      },
    },
    isError: { type: 'boolean' },
  },
});

export const isListResourcesResult = ajv.compile<ListResourcesResult>({
  type: 'object',
  required: ['resources'],
  properties: {
    resources: {
      type: 'array',
      items: {
        type: 'object',
        required: ['uri'],
        properties: { uri: { type: 'string' }, name: { type: 'string' }, mimeType: { type: 'string' } },
      },
    },
    nextCursor: { type: 'string' },
  },
});

export const isReadResourceResult = ajv.compile<ReadResourceResult>({
  type: 'object',
  required: ['contents'],
  properties: {
    contents: {
      type: 'array',
      items: {
        type: 'object',
        required: ['uri'],
        properties: {
          uri: { type: 'string' },
          mimeType: { type: 'string' },
          text: { type: 'string' },
          blob: { type: 'string' },
        },
      },
    },
  },
});

/** Human-readable summary of the last validation failure. */
export function schemaErrors(validate: { errors?: ErrorObject[] | null }): string {
  return ajv.errorsText(validate.errors);
}

/** `{ session_id }` or `{ sessionId }` payload of a `session` event. */
export const isSessionPayload = ajv.compile<{ session_id?: string; sessionId?: string }>({
  type: 'object',
  properties: {
    session_id: { type: 'string' },
    sessionId: { type: 'string' },
  },
});
