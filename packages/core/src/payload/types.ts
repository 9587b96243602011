import { z } from "zod";

/**
 * Every payload type the protocol knows, and whether a server may accept it
 * from a client. Types that are not receivable are only ever sent.
 */
const PAYLOAD_TYPE_NAMES = ["LIST_REQUEST", "LIST_RESPONSE", "ERROR"] as const;

export type PayloadType = (typeof PAYLOAD_TYPE_NAMES)[number];

export const PAYLOAD_TYPES = {
  LIST_REQUEST: { receivable: true },
  LIST_RESPONSE: { receivable: false },
  ERROR: { receivable: false },
} as const satisfies Record<PayloadType, { receivable: boolean }>;

export type ReceivableType = {
  [K in PayloadType]: (typeof PAYLOAD_TYPES)[K]["receivable"] extends true
    ? K
    : never;
}[PayloadType];

export function isReceivable(type: PayloadType): type is ReceivableType {
  return PAYLOAD_TYPES[type].receivable;
}

/** Unknown type strings fail here instead of defaulting to some variant. */
export const PayloadTypeSchema = z.enum(PAYLOAD_TYPE_NAMES);

/** Fields shared by every payload. */
export const EnvelopeSchema = z.object({
  code: z.number().int(),
  message: z.string().default(""),
  type: PayloadTypeSchema,
  state: z.string().default(""),
});

const envelopeFields = {
  code: EnvelopeSchema.shape.code,
  message: EnvelopeSchema.shape.message,
  state: EnvelopeSchema.shape.state,
};

export const ListRequestSchema = z.object({
  ...envelopeFields,
  type: z.literal("LIST_REQUEST"),
  query: z.string().default(""),
  starred: z.boolean().optional(),
  trashed: z.boolean().optional(),
});

export const ListItemSchema = z.object({
  name: z.string(),
  size: z.number().int().nonnegative(),
  kindCode: z.number().int(),
  modifiedAtMillis: z.number().int(),
  contentHash: z.string(),
});

export const ListResponseSchema = z.object({
  ...envelopeFields,
  type: z.literal("LIST_RESPONSE"),
  items: z.array(ListItemSchema),
});

export const ErrorPayloadSchema = z.object({
  ...envelopeFields,
  type: z.literal("ERROR"),
  stackTrace: z.string().default(""),
});

export const PayloadSchema = z.discriminatedUnion("type", [
  ListRequestSchema,
  ListResponseSchema,
  ErrorPayloadSchema,
]);

export type Envelope = z.infer<typeof EnvelopeSchema>;
export type ListRequest = z.infer<typeof ListRequestSchema>;
export type ListItem = z.infer<typeof ListItemSchema>;
export type ListResponse = z.infer<typeof ListResponseSchema>;
export type ErrorPayload = z.infer<typeof ErrorPayloadSchema>;
export type Payload = z.infer<typeof PayloadSchema>;

export type ReceivablePayload = Extract<Payload, { type: ReceivableType }>;
export type OutgoingPayload = Exclude<Payload, ReceivablePayload>;
