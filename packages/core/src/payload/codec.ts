/**
 * Line codec for the socket protocol.
 *
 * A line is decoded in steps over a single JSON parse: the raw object
 * first, so the dispatcher can drop a failure report whatever else it
 * carries, then the envelope (code, type, state), then the full variant
 * selected by `type`.
 */

import type { z } from "zod";
import { PayloadDecodeError } from "../errors/catalog.js";
import { ok, err, type Result } from "../result/index.js";
import {
  EnvelopeSchema,
  PayloadSchema,
  isReceivable,
  type Envelope,
  type ErrorPayload,
  type ListItem,
  type ListResponse,
  type Payload,
  type ReceivablePayload,
} from "./types.js";

export interface DecodeFailure {
  error: PayloadDecodeError;
  /** Correlation token recovered from the raw message, or "" */
  state: string;
}

export interface DecodedEnvelope {
  envelope: Envelope;
  raw: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function recoverState(raw: Record<string, unknown>): string {
  return typeof raw.state === "string" ? raw.state : "";
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/** Parse one line into a JSON object without validating any field. */
export function parseLine(
  line: string,
): Result<Record<string, unknown>, DecodeFailure> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (e) {
    return err({
      error: new PayloadDecodeError(
        `Malformed JSON: ${e instanceof Error ? e.message : String(e)}`,
      ),
      state: "",
    });
  }

  if (!isRecord(parsed)) {
    return err({
      error: new PayloadDecodeError("Payload must be a JSON object"),
      state: "",
    });
  }
  return ok(parsed);
}

/** The sender reports a failure of its own (`code < 1`); never answered. */
export function reportsFailure(raw: Record<string, unknown>): boolean {
  return typeof raw.code === "number" && raw.code < 1;
}

export function validateEnvelope(
  raw: Record<string, unknown>,
): Result<DecodedEnvelope, DecodeFailure> {
  const envelope = EnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return err({
      error: new PayloadDecodeError(
        `Invalid envelope: ${describeIssues(envelope.error)}`,
      ),
      state: recoverState(raw),
    });
  }

  return ok({ envelope: envelope.data, raw });
}

export function decodeEnvelope(
  line: string,
): Result<DecodedEnvelope, DecodeFailure> {
  const parsed = parseLine(line);
  if (!parsed.ok) return parsed;
  return validateEnvelope(parsed.value);
}

/** Decode the full variant of a message already known to be receivable. */
export function decodeRequest(
  raw: Record<string, unknown>,
): Result<ReceivablePayload, DecodeFailure> {
  const state = recoverState(raw);
  const payload = PayloadSchema.safeParse(raw);
  if (!payload.success) {
    return err({
      error: new PayloadDecodeError(
        `Invalid payload: ${describeIssues(payload.error)}`,
      ),
      state,
    });
  }
  const value = payload.data;
  if (!isReceivablePayload(value)) {
    return err({
      error: new PayloadDecodeError(
        `Payload type ${value.type} is not receivable`,
      ),
      state,
    });
  }
  return ok(value);
}

/** Decode a line sent by the server; used by clients. */
export function decodeResponse(line: string): Result<Payload, DecodeFailure> {
  const decoded = decodeEnvelope(line);
  if (!decoded.ok) return decoded;
  const payload = PayloadSchema.safeParse(decoded.value.raw);
  if (!payload.success) {
    return err({
      error: new PayloadDecodeError(
        `Invalid payload: ${describeIssues(payload.error)}`,
      ),
      state: decoded.value.envelope.state,
    });
  }
  return ok(payload.data);
}

export function isReceivablePayload(
  payload: Payload,
): payload is ReceivablePayload {
  return isReceivable(payload.type);
}

/** Single-line JSON; pretty printing would break line framing. */
export function encodePayload(payload: Payload): string {
  return JSON.stringify(payload);
}

export function listResponse(
  state: string,
  items: ListItem[],
  message = "Success",
): ListResponse {
  return { code: 1, message, type: "LIST_RESPONSE", state, items };
}

export function errorPayload(
  message: string,
  state: string,
  stackTrace: string,
): ErrorPayload {
  return {
    code: 0,
    message: message || "Unknown error",
    type: "ERROR",
    state,
    stackTrace,
  };
}
