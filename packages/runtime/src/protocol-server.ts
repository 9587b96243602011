/**
 * Line-delimited JSON protocol server.
 *
 * Accepts TCP connections and reads each one as UTF-8 lines. Every line is
 * shown to the registered observers in registration order, then dispatched
 * as an independent task: decode, route by payload type, reply on the same
 * connection. Replies may leave in a different order than requests arrived;
 * clients match them through the `state` token.
 *
 * Dispatch outcomes for one non-blank line:
 * - not a JSON object         → ERROR with state ""
 * - code < 1                  → dropped, nothing written
 * - invalid envelope or body  → ERROR (recovered state or "")
 * - type not receivable       → ERROR
 * - receivable, no handler    → ERROR "Unsupported payload type: X"
 * - handler result            → success payload, or ERROR for a failure
 * - handler throws            → ERROR with the exception's message
 */

import {
  createServer,
  type AddressInfo,
  type Server,
  type Socket,
} from "node:net";
import { createInterface } from "node:readline";
import type { Logger } from "pino";
import {
  SocketWriteError,
  UnreceivablePayloadError,
  UnsupportedPayloadError,
  stackTraceOf,
} from "@sheetshelf/core/errors";
import {
  decodeRequest,
  encodePayload,
  errorPayload,
  isReceivable,
  parseLine,
  reportsFailure,
  validateEnvelope,
  type OutgoingPayload,
  type Payload,
  type ReceivablePayload,
  type ReceivableType,
} from "@sheetshelf/core/payload";
import type { Result } from "@sheetshelf/core/result";

export type Connection = Socket;

/** Sees every line, blank ones included, before dispatch. Must not block. */
export type LineObserver = (connection: Connection, line: string) => void;

export type RequestOf<K extends ReceivableType> = Extract<
  ReceivablePayload,
  { type: K }
>;

export type RequestHandler<K extends ReceivableType> = (
  request: RequestOf<K>,
  connection: Connection,
) => Promise<Result<OutgoingPayload, Error>>;

type HandlerTable = { [K in ReceivableType]?: RequestHandler<K> };

export interface ProtocolServerOptions {
  /** Interface to bind. Default: 127.0.0.1 */
  host?: string;
  /** TCP port; 0 picks an ephemeral one. */
  port: number;
  logger: Logger;
}

export class ProtocolServer {
  private server: Server | null = null;
  private readonly observers = new Set<LineObserver>();
  private readonly handlers: HandlerTable = {};
  private readonly connections = new Set<Connection>();
  private readonly inFlight = new Set<Promise<void>>();

  private readonly host: string;
  private readonly port: number;
  private readonly logger: Logger;

  constructor(options: ProtocolServerOptions) {
    this.host = options.host ?? "127.0.0.1";
    this.port = options.port;
    this.logger = options.logger;
  }

  /**
   * Bind the listener. Resolves with the bound address once listening;
   * rejects if the bind fails.
   */
  start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error("Protocol server already started");
    }

    const server = createServer((socket) => this.accept(socket));
    this.server = server;

    return new Promise((resolve, reject) => {
      const onBindError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once("error", onBindError);

      server.listen(this.port, this.host, () => {
        server.removeListener("error", onBindError);
        server.on("error", (err) => {
          this.logger.error({ err }, "Listener error");
        });

        const address = server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("Protocol server is not bound to a TCP address"));
          return;
        }
        this.logger.info(
          { host: address.address, port: address.port },
          "Protocol server listening",
        );
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting connections. Connections already accepted keep their
   * read loops and can still be answered.
   */
  close(): void {
    if (!this.server) return;
    this.server.close();
    this.server = null;
    this.logger.info("Protocol server stopped listening");
  }

  /** Register a raw-line observer; returns a function that removes it. */
  addReceiver(observer: LineObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  registerHandler<K extends ReceivableType>(
    type: K,
    handler: RequestHandler<K>,
  ): void {
    const handlers: { [P in K]?: RequestHandler<P> } = this.handlers;
    handlers[type] = handler;
  }

  /** Write one line to a connection. Resolves once the write is flushed. */
  sendData(connection: Connection, payload: Payload | string): Promise<void> {
    const line = typeof payload === "string" ? payload : encodePayload(payload);
    return new Promise((resolve, reject) => {
      connection.write(`${line}\n`, "utf8", (err) => {
        if (err) reject(new SocketWriteError(err));
        else resolve();
      });
    });
  }

  /** Wait until every dispatch started so far has finished. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  connectionCount(): number {
    return this.connections.size;
  }

  private accept(socket: Socket): void {
    const peer = `${socket.remoteAddress}:${socket.remotePort}`;
    const log = this.logger.child({ peer });

    this.connections.add(socket);
    log.debug("Connection accepted");

    socket.on("error", (err) => {
      log.warn({ err }, "Connection error");
    });
    socket.once("close", () => {
      this.connections.delete(socket);
      log.debug("Connection closed");
    });

    const lines = createInterface({ input: socket, crlfDelay: Infinity });
    lines.on("line", (line) => this.receive(socket, line));
    lines.on("error", (err) => {
      log.warn({ err }, "Read loop ended");
    });
  }

  private receive(connection: Connection, line: string): void {
    for (const observer of [...this.observers]) {
      try {
        observer(connection, line);
      } catch (err) {
        this.logger.error({ err }, "Line observer failed");
      }
    }

    if (line.trim() === "") return;

    const task: Promise<void> = this.dispatch(connection, line)
      .catch((err: unknown) => {
        this.logger.error({ err }, "Dispatch failed");
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async dispatch(connection: Connection, line: string): Promise<void> {
    const parsed = parseLine(line);
    if (!parsed.ok) {
      this.logger.warn({ err: parsed.error.error }, "Undecodable line");
      await this.replyError(connection, parsed.error.error, parsed.error.state);
      return;
    }

    if (reportsFailure(parsed.value)) {
      const { code, type, message } = parsed.value;
      this.logger.warn(
        { code, type, message },
        "Dropping payload reporting failure",
      );
      return;
    }

    const decoded = validateEnvelope(parsed.value);
    if (!decoded.ok) {
      this.logger.warn({ err: decoded.error.error }, "Invalid envelope");
      await this.replyError(connection, decoded.error.error, decoded.error.state);
      return;
    }

    const { envelope, raw } = decoded.value;
    if (!isReceivable(envelope.type)) {
      const error = new UnreceivablePayloadError(envelope.type);
      this.logger.warn({ type: envelope.type }, error.message);
      await this.replyError(connection, error, envelope.state);
      return;
    }

    const request = decodeRequest(raw);
    if (!request.ok) {
      this.logger.warn({ err: request.error.error }, "Invalid request");
      await this.replyError(connection, request.error.error, request.error.state);
      return;
    }

    const { state } = request.value;
    const handler = this.handlers[request.value.type];
    if (!handler) {
      const error = new UnsupportedPayloadError(request.value.type);
      this.logger.warn({ type: request.value.type }, error.message);
      await this.replyError(connection, error, state);
      return;
    }

    let result: Result<OutgoingPayload, Error>;
    try {
      result = await handler(request.value, connection);
    } catch (err) {
      this.logger.error({ err, type: request.value.type }, "Handler threw");
      await this.sendData(
        connection,
        errorPayload(
          err instanceof Error ? err.message : String(err),
          state,
          stackTraceOf(err),
        ),
      );
      return;
    }

    if (result.ok) {
      await this.sendData(connection, result.value);
    } else {
      this.logger.warn({ err: result.error }, "Handler failed");
      await this.replyError(connection, result.error, state);
    }
  }

  private replyError(
    connection: Connection,
    error: Error,
    state: string,
  ): Promise<void> {
    return this.sendData(
      connection,
      errorPayload(error.message, state, stackTraceOf(error)),
    );
  }
}
