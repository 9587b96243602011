export {
  PAYLOAD_TYPES,
  isReceivable,
  PayloadTypeSchema,
  EnvelopeSchema,
  ListRequestSchema,
  ListItemSchema,
  ListResponseSchema,
  ErrorPayloadSchema,
  PayloadSchema,
  type PayloadType,
  type ReceivableType,
  type Envelope,
  type ListRequest,
  type ListItem,
  type ListResponse,
  type ErrorPayload,
  type Payload,
  type ReceivablePayload,
  type OutgoingPayload,
} from "./types.js";
export {
  parseLine,
  reportsFailure,
  validateEnvelope,
  decodeEnvelope,
  decodeRequest,
  decodeResponse,
  isReceivablePayload,
  encodePayload,
  listResponse,
  errorPayload,
  type DecodeFailure,
  type DecodedEnvelope,
} from "./codec.js";
