#!/usr/bin/env node
// List the tools an MCP server exposes over SSE, one name per line.
// Usage: mcp-sse-list-tools [url]   (or MCP_SSE_URL, MCP_TOKEN, MCP_LOG_LEVEL)

import { MCPClient } from '../mcp/client.js';
import { loadConfigFromEnv } from '../core/config.js';
import { LogLevel, setGlobalLogLevel } from '../core/logger.js';

async function main(): Promise<number> {
  const env = { ...process.env };
  const urlArg = process.argv[2];
  if (urlArg) env.MCP_SSE_URL = urlArg;

  const loaded = loadConfigFromEnv(env);
  if (!loaded.ok) {
    process.stderr.write(`${loaded.error.message}\n`);
    process.stderr.write('Usage: mcp-sse-list-tools <url>\n');
    return 1;
  }

  // Logs go to stdout by default; keep them out of the tool list
  setGlobalLogLevel(loaded.value.logLevel ?? LogLevel.WARN);

  const client = new MCPClient(loaded.value.input);
  try {
    await client.connect();
    const { tools } = await client.listTools();
    for (const tool of tools) {
      process.stdout.write(`${tool.name}\n`);
    }
    return 0;
  } finally {
    client.dispose();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);
