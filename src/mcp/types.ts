/**
 * MCP result shapes for the calls the client wraps.
 * Servers may add fields; only the ones the client reads are typed.
 */

import type { JsonObject, JsonRpcNotification } from '../core/types.js';

export interface Implementation {
  name: string;
  version?: string;
}

export interface InitializeResult {
  protocolVersion?: string;
  capabilities?: JsonObject;
  serverInfo?: Implementation;
  instructions?: string;
  /** Non-standard; some SSE servers return the session here. */
  session_id?: string;
  sessionId?: string;
  [key: string]: unknown;
}

export interface Tool {
  name: string;
  description?: string;
  inputSchema?: JsonObject;
  [key: string]: unknown;
}

export interface ListToolsResult {
  tools: Tool[];
  nextCursor?: string;
  [key: string]: unknown;
}

export interface ContentBlock {
  type: string;
  text?: string;
  [key: string]: unknown;
}

export interface CallToolResult {
  content: ContentBlock[];
  isError?: boolean;
  [key: string]: unknown;
}

export interface Resource {
  uri: string;
  name?: string;
  mimeType?: string;
  [key: string]: unknown;
}

export interface ListResourcesResult {
  resources: Resource[];
  nextCursor?: string;
  [key: string]: unknown;
}

export interface ResourceContents {
  uri: string;
  mimeType?: string;
  text?: string;
  blob?: string;
}

export interface ReadResourceResult {
  contents: ResourceContents[];
  [key: string]: unknown;
}

/** Handler for server-initiated notifications. */
export type NotificationHandler = (notification: JsonRpcNotification) => void;
