/**
 * Client configuration: defaults, validation and environment loading.
 */

import { Ajv } from 'ajv';
import type { ClientOptions, JsonObject, Result } from './types.js';
import { ConfigError } from './errors.js';
import { parseLogLevel, type LogLevel } from './logger.js';

export const DEFAULT_PROTOCOL_VERSION = '2025-06-18';
/** Version retried once when the server rejects the requested one. */
export const LEGACY_PROTOCOL_VERSION = '2024-11-05';
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
export const DEFAULT_CONNECT_GRACE_MS = 200;

export interface ClientConfigInput {
  url: string;
  token?: string;
  requestTimeoutMs?: number;
  connectGraceMs?: number;
  clientName?: string;
  clientVersion?: string;
  protocolVersion?: string;
  capabilities?: JsonObject;
  headers?: Record<string, string>;
}

export interface ClientConfig extends ClientOptions {
  readonly url: string;
  readonly requestTimeoutMs: number;
  readonly connectGraceMs: number;
}

const ajv = new Ajv({ strict: false, allErrors: true });

const inputSchema = {
  type: 'object',
  required: ['url'],
  properties: {
    url: { type: 'string', pattern: '^[hH][tT][tT][pP][sS]?://' },
    token: { type: 'string' },
    requestTimeoutMs: { type: 'integer', minimum: 1 },
    connectGraceMs: { type: 'integer', minimum: 0 },
    clientName: { type: 'string', minLength: 1 },
    clientVersion: { type: 'string', minLength: 1 },
    protocolVersion: { type: 'string', minLength: 1 },
    capabilities: { type: 'object' },
    headers: { type: 'object', additionalProperties: { type: 'string' } },
  },
};

const validateInput = ajv.compile<ClientConfigInput>(inputSchema);

/**
 * Merge defaults into `input` and validate it. A bearer token becomes an
 * `Authorization` header unless the caller set one explicitly.
 */
export function resolveConfig(input: ClientConfigInput): Result<ClientConfig, ConfigError> {
  const candidate: ClientConfigInput = { ...input };
  if (!validateInput(candidate)) {
    return { ok: false, error: new ConfigError(`Invalid client configuration: ${ajv.errorsText(validateInput.errors)}`) };
  }

  const headers: Record<string, string> = {};
  if (candidate.token) {
    headers['Authorization'] = `Bearer ${candidate.token}`;
  }
  Object.assign(headers, candidate.headers);

  return {
    ok: true,
    value: Object.freeze({
      url: candidate.url,
      requestTimeoutMs: candidate.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      connectGraceMs: candidate.connectGraceMs ?? DEFAULT_CONNECT_GRACE_MS,
      clientName: candidate.clientName ?? 'mcp-sse-client',
      clientVersion: candidate.clientVersion ?? '1.0.0',
      protocolVersion: candidate.protocolVersion ?? DEFAULT_PROTOCOL_VERSION,
      capabilities: Object.freeze({ ...candidate.capabilities }),
      headers: Object.freeze(headers),
    }),
  };
}

// ── Environment ──

export interface EnvConfig {
  input: ClientConfigInput;
  logLevel?: LogLevel;
}

/**
 * Read configuration from `MCP_SSE_URL`, `MCP_TOKEN`, `MCP_REQUEST_TIMEOUT_MS`,
 * `MCP_PROTOCOL_VERSION` and `MCP_LOG_LEVEL`. The returned input still goes
 * through {@link resolveConfig}.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Result<EnvConfig, ConfigError> {
  const url = env.MCP_SSE_URL?.trim();
  if (!url) {
    return { ok: false, error: new ConfigError('MCP_SSE_URL is not set') };
  }

  const input: ClientConfigInput = { url };
  const token = env.MCP_TOKEN?.trim();
  if (token) input.token = token;

  const timeout = env.MCP_REQUEST_TIMEOUT_MS?.trim();
  if (timeout) {
    const parsed = Number(timeout);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      return { ok: false, error: new ConfigError(`MCP_REQUEST_TIMEOUT_MS must be a positive integer, got "${timeout}"`) };
    }
    input.requestTimeoutMs = parsed;
  }

  const version = env.MCP_PROTOCOL_VERSION?.trim();
  if (version) input.protocolVersion = version;

  let logLevel: LogLevel | undefined;
  const levelName = env.MCP_LOG_LEVEL?.trim();
  if (levelName) {
    logLevel = parseLogLevel(levelName);
    if (logLevel === undefined) {
      return { ok: false, error: new ConfigError(`Unknown MCP_LOG_LEVEL "${levelName}"`) };
    }
  }

  return { ok: true, value: { input, logLevel } };
}
