/**
 * Client for the line protocol.
 *
 * Writes one JSON payload per line and pairs replies with requests through
 * their `state` token, so replies that arrive out of order still reach the
 * right caller. Used by tests and local tooling.
 */

import { connect as netConnect, type Socket } from "node:net";
import { createInterface } from "node:readline";
import {
  decodeEnvelope,
  decodeResponse,
  encodePayload,
  type Payload,
} from "@sheetshelf/core/payload";

export interface LineClientOptions {
  /** Default: 127.0.0.1 */
  host?: string;
  port: number;
  /** Time to wait for a reply in ms. Default: 5000 */
  timeoutMs?: number;
}

interface Waiter {
  match: (line: string) => boolean;
  resolve: (line: string) => void;
}

function stateOf(line: string): string {
  const decoded = decodeEnvelope(line);
  return decoded.ok ? decoded.value.envelope.state : decoded.error.state;
}

export class LineClient {
  private readonly buffered: string[] = [];
  private readonly waiting: Waiter[] = [];

  private constructor(
    private readonly socket: Socket,
    private readonly timeoutMs: number,
  ) {
    const lines = createInterface({ input: socket, crlfDelay: Infinity });
    lines.on("line", (line) => this.onLine(line));
  }

  static connect(options: LineClientOptions): Promise<LineClient> {
    return new Promise((resolve, reject) => {
      const socket = netConnect(options.port, options.host ?? "127.0.0.1");
      socket.setEncoding("utf8");
      socket.once("error", reject);
      socket.once("connect", () => {
        socket.removeListener("error", reject);
        resolve(new LineClient(socket, options.timeoutMs ?? 5_000));
      });
    });
  }

  /** Write a line as is; a newline is appended. */
  sendRaw(line: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(`${line}\n`, "utf8", (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Send a payload and wait for the reply carrying the same state. */
  async request(payload: Payload): Promise<Payload> {
    await this.sendRaw(encodePayload(payload));
    const line = await this.take((l) => stateOf(l) === payload.state);
    const decoded = decodeResponse(line);
    if (!decoded.ok) throw decoded.error.error;
    return decoded.value;
  }

  /** The next line received, whatever its state. */
  nextLine(): Promise<string> {
    return this.take(() => true);
  }

  /** Lines received that no caller has taken yet. */
  pending(): readonly string[] {
    return [...this.buffered];
  }

  close(): void {
    this.socket.destroy();
  }

  private onLine(line: string): void {
    const index = this.waiting.findIndex((w) => w.match(line));
    if (index === -1) {
      this.buffered.push(line);
      return;
    }
    const [waiter] = this.waiting.splice(index, 1);
    waiter.resolve(line);
  }

  private take(match: (line: string) => boolean): Promise<string> {
    const index = this.buffered.findIndex(match);
    if (index !== -1) {
      const [line] = this.buffered.splice(index, 1);
      return Promise.resolve(line);
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        match,
        resolve: (line) => {
          clearTimeout(timer);
          resolve(line);
        },
      };
      const timer = setTimeout(() => {
        const at = this.waiting.indexOf(waiter);
        if (at !== -1) this.waiting.splice(at, 1);
        reject(new Error(`No reply within ${this.timeoutMs} ms`));
      }, this.timeoutMs);
      this.waiting.push(waiter);
    });
  }
}
