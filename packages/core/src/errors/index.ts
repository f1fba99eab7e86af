export {
  AdapterError,
  ConfigError,
  AuthError,
  ProtocolError,
  TransferError,
  NotFoundError,
  type FailedOutput,
  type TransferErrorOptions,
} from "./catalog.js";
