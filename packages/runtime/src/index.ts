export {
  ProtocolServer,
  type ProtocolServerOptions,
  type Connection,
  type LineObserver,
  type RequestHandler,
  type RequestOf,
} from "./protocol-server.js";
export { LineClient, type LineClientOptions } from "./line-client.js";
export {
  adminSocketPath,
  ADMIN_SOCKET_FILE,
  MAX_SOCKET_PATH_BYTES,
  type AdminSocketOptions,
} from "./admin-socket.js";
export {
  listenAdminSocket,
  type AdminServer,
  type AdminServerOptions,
} from "./admin-server.js";
export {
  AdminClient,
  type AdminClientOptions,
  type UploadsQuery,
} from "./admin-client.js";
