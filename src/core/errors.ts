/**
 * Error hierarchy. Every error raised by the client extends MCPClientError.
 */

export class MCPClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MCPClientError';
  }
}

/** The event stream could not be opened by either decoder. */
export class ConnectionError extends MCPClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/** An outbound POST was rejected (status >= 400) or never reached the server. */
export class DeliveryError extends MCPClientError {
  constructor(
    readonly url: string,
    readonly status?: number,
    readonly body?: string,
    options?: { cause?: unknown },
  ) {
    super(
      status !== undefined
        ? `POST ${url} failed: ${status} ${body ?? ''}`.trimEnd()
        : `POST ${url} failed`,
      options,
    );
    this.name = 'DeliveryError';
  }
}

export class RequestTimeoutError extends MCPClientError {
  constructor(
    readonly requestId: string,
    readonly method: string,
    readonly timeoutMs: number,
  ) {
    super(`Request ${requestId} timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

/** JSON-RPC error response from the server. */
export class RpcError extends MCPClientError {
  constructor(
    message: string,
    readonly code?: number,
    readonly data?: unknown,
  ) {
    super(message);
    this.name = 'RpcError';
  }
}

export class ClientDisposedError extends MCPClientError {
  constructor(message = 'Client disposed') {
    super(message);
    this.name = 'ClientDisposedError';
  }
}

export class InvalidStateError extends MCPClientError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

export class DuplicateRequestIdError extends MCPClientError {
  constructor(readonly requestId: string) {
    super(`Request id already pending: ${requestId}`);
    this.name = 'DuplicateRequestIdError';
  }
}

export class ConfigError extends MCPClientError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** An `endpoint` event value that cannot be turned into a submission URL. */
export class InvalidEndpointError extends MCPClientError {
  constructor(readonly rawValue: string, message: string) {
    super(message);
    this.name = 'InvalidEndpointError';
  }
}

/** A result or message that does not have the shape the protocol requires. */
export class ProtocolError extends MCPClientError {
  constructor(message: string, readonly details?: string) {
    super(details ? `${message}: ${details}` : message);
    this.name = 'ProtocolError';
  }
}
