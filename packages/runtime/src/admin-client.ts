/**
 * Typed client for the admin socket.
 *
 * Each method issues one GET and validates the body against the schema the
 * server builds it from. A non-2xx answer becomes an AdminRequestError
 * carrying the server's error code.
 */

import { request as httpRequest, type IncomingMessage } from "node:http";
import type { z } from "zod";
import { AdminRequestError } from "@sheetshelf/core/errors";
import {
  AdminErrorBodySchema,
  HealthReportSchema,
  ListenerStatusSchema,
  RootFolderSchema,
  UploadListingSchema,
  type HealthReport,
  type ListenerStatus,
  type RootFolder,
  type UploadListing,
} from "@sheetshelf/core/schemas";

export interface AdminClientOptions {
  socketPath: string;
  /** Request timeout in ms. Default: 5000 */
  timeoutMs?: number;
}

export interface UploadsQuery {
  /** Virtual path; the server treats an invalid one as "/". */
  path?: string;
  starred?: boolean;
  trashed?: boolean;
}

interface RawResponse {
  status: number;
  body: string;
}

function parseBody(raw: RawResponse): unknown {
  try {
    return JSON.parse(raw.body);
  } catch (err) {
    throw new AdminRequestError(
      raw.status,
      "INVALID_RESPONSE",
      "Admin response is not valid JSON",
      { cause: err },
    );
  }
}

export class AdminClient {
  private readonly socketPath: string;
  private readonly timeoutMs: number;

  constructor(options: AdminClientOptions) {
    this.socketPath = options.socketPath;
    this.timeoutMs = options.timeoutMs ?? 5_000;
  }

  health(): Promise<HealthReport> {
    return this.get("/health", HealthReportSchema);
  }

  status(): Promise<ListenerStatus> {
    return this.get("/status", ListenerStatusSchema);
  }

  /** Resolves (or creates) the catalog's root folder. */
  root(): Promise<RootFolder> {
    return this.get("/root", RootFolderSchema);
  }

  uploads(query: UploadsQuery = {}): Promise<UploadListing> {
    const params = new URLSearchParams();
    if (query.path !== undefined) params.set("path", query.path);
    if (query.starred !== undefined) {
      params.set("starred", String(query.starred));
    }
    if (query.trashed !== undefined) {
      params.set("trashed", String(query.trashed));
    }
    const search = params.toString();
    return this.get(
      search ? `/uploads?${search}` : "/uploads",
      UploadListingSchema,
    );
  }

  private async get<S extends z.ZodType>(
    path: string,
    schema: S,
  ): Promise<z.output<S>> {
    const raw = await this.send(path);
    const body = parseBody(raw);

    if (raw.status < 200 || raw.status >= 300) {
      const failure = AdminErrorBodySchema.safeParse(body);
      if (failure.success) {
        const { errorCode, message } = failure.data.error;
        throw new AdminRequestError(raw.status, errorCode, message);
      }
      throw new AdminRequestError(
        raw.status,
        "UNEXPECTED_STATUS",
        `Admin request failed with status ${raw.status}`,
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new AdminRequestError(
        raw.status,
        "INVALID_RESPONSE",
        `Unexpected admin response for ${path}`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  private send(path: string): Promise<RawResponse> {
    return new Promise((resolve, reject) => {
      const req = httpRequest(
        {
          socketPath: this.socketPath,
          method: "GET",
          path,
          timeout: this.timeoutMs,
        },
        (res: IncomingMessage) => {
          let data = "";
          res.setEncoding("utf8");
          res.on("data", (chunk: string) => {
            data += chunk;
          });
          res.on("end", () => {
            resolve({ status: res.statusCode ?? 0, body: data });
          });
          res.on("error", reject);
        },
      );

      req.on("error", reject);
      req.on("timeout", () => {
        req.destroy(new Error("Admin request timed out"));
      });
      req.end();
    });
  }
}
