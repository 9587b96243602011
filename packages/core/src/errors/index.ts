export {
  SheetShelfError,
  PayloadDecodeError,
  UnreceivablePayloadError,
  UnsupportedPayloadError,
  SocketWriteError,
  RemoteStoreError,
  ItemNotFoundError,
  ConfigError,
  AdminSocketError,
  AdminRequestError,
  stackTraceOf,
} from "./catalog.js";
