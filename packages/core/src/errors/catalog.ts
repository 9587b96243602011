/**
 * Typed error catalog shared by the protocol server and the remote catalog.
 *
 * Protocol errors end up on the wire as ERROR payloads; remote store errors
 * propagate out of catalog operations unless the operation degrades to an
 * empty result.
 */

export class SheetShelfError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Protocol errors

export class PayloadDecodeError extends SheetShelfError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PAYLOAD_DECODE", message, details);
  }
}

export class UnreceivablePayloadError extends SheetShelfError {
  constructor(public readonly payloadType: string) {
    super(
      "UNRECEIVABLE_TYPE",
      `Received unreceivable payload type: ${payloadType}`,
      { type: payloadType },
    );
  }
}

export class UnsupportedPayloadError extends SheetShelfError {
  constructor(public readonly payloadType: string) {
    super("UNSUPPORTED_TYPE", `Unsupported payload type: ${payloadType}`, {
      type: payloadType,
    });
  }
}

export class SocketWriteError extends SheetShelfError {
  constructor(cause: Error) {
    super("SOCKET_WRITE", `Failed to write to socket: ${cause.message}`, undefined, {
      cause,
    });
  }
}

// Remote store errors

export class RemoteStoreError extends SheetShelfError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(
      "REMOTE_STORE",
      message,
      status !== undefined ? { status } : undefined,
      options,
    );
  }
}

export class ItemNotFoundError extends RemoteStoreError {
  constructor(public readonly itemId: string) {
    super(`Item not found: ${itemId}`, 404);
  }
}

// Configuration

export class ConfigError extends SheetShelfError {
  constructor(configPath: string, message: string, options?: ErrorOptions) {
    super("CONFIG_INVALID", message, { configPath }, options);
  }
}

// Admin socket

export class AdminSocketError extends SheetShelfError {
  constructor(
    public readonly socketPath: string,
    message: string,
  ) {
    super("ADMIN_SOCKET", message, { socketPath });
  }
}

/** Non-2xx answer from the admin socket, carrying the server's error body. */
export class AdminRequestError extends SheetShelfError {
  constructor(
    public readonly status: number,
    remoteCode: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(remoteCode, message, { status }, options);
  }
}

/** Diagnostic trace for an error payload; falls back to the message. */
export function stackTraceOf(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}
