import { z } from "zod";

export const DEFAULTS = {
  server: {
    host: "127.0.0.1",
    port: 4567,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  drive: {
    apiUrl: "https://www.googleapis.com/drive/v3",
    pageSize: 50,
    rootFolderName: "sheetStore",
  },
  admin: {
    enabled: true,
  },
};

export const ServerConfigSchema = z.object({
  server: z
    .object({
      host: z
        .string()
        .min(1)
        .default(DEFAULTS.server.host)
        .describe("Interface the protocol listener binds to"),
      port: z.number().int().min(0).max(65535).default(DEFAULTS.server.port),
    })
    .default(DEFAULTS.server),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  drive: z
    .object({
      apiUrl: z.url().default(DEFAULTS.drive.apiUrl),
      pageSize: z
        .number()
        .int()
        .min(1)
        .max(1000)
        .default(DEFAULTS.drive.pageSize),
      rootFolderName: z
        .string()
        .min(1)
        .default(DEFAULTS.drive.rootFolderName)
        .describe("Folder holding every catalog item"),
    })
    .default(DEFAULTS.drive),
  admin: z
    .object({
      enabled: z
        .boolean()
        .default(DEFAULTS.admin.enabled)
        .describe("Serve the admin routes on a Unix socket"),
      socketPath: z
        .string()
        .min(1)
        .optional()
        .describe("Admin socket location. Default: admin.sock in the root"),
    })
    .default(DEFAULTS.admin),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = ServerConfig["logging"];
export type DriveConfig = ServerConfig["drive"];
export type AdminConfig = ServerConfig["admin"];
