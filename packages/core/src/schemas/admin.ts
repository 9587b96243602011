/**
 * Bodies served on the admin socket. The server builds them; AdminClient
 * validates them on the way back in.
 */

import { z } from "zod";
import { ListItemSchema } from "../payload/types.js";

export const HealthReportSchema = z.object({
  status: z.literal("healthy"),
  version: z.string(),
  /** Whole seconds since the process started. */
  uptime: z.number().int().nonnegative(),
});

export const ListenerStatusSchema = z.object({
  status: z.enum(["starting", "running"]),
  port: z.number().int().nullable(),
  connections: z.number().int().nonnegative(),
});

export const RootFolderSchema = z.object({
  id: z.string(),
  name: z.string(),
});

export const UploadListingSchema = z.object({
  path: z.string(),
  items: z.array(ListItemSchema),
});

const flag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

/** Query string of GET /uploads. */
export const UploadQuerySchema = z.object({
  path: z.string().default("/"),
  starred: flag,
  trashed: flag,
});

export const AdminErrorBodySchema = z.object({
  error: z.object({
    errorCode: z.string(),
    message: z.string(),
  }),
});

export type HealthReport = z.infer<typeof HealthReportSchema>;
export type ListenerStatus = z.infer<typeof ListenerStatusSchema>;
export type RootFolder = z.infer<typeof RootFolderSchema>;
export type UploadListing = z.infer<typeof UploadListingSchema>;
