export {
  DEFAULTS,
  ServerConfigSchema,
  type ServerConfig,
  type LoggingConfig,
  type DriveConfig,
  type AdminConfig,
} from "./server-config.js";
export {
  HealthReportSchema,
  ListenerStatusSchema,
  RootFolderSchema,
  UploadListingSchema,
  UploadQuerySchema,
  AdminErrorBodySchema,
  type HealthReport,
  type ListenerStatus,
  type RootFolder,
  type UploadListing,
} from "./admin.js";
