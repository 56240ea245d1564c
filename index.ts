export { DrillClient, createDefaultClient } from "./src/client/drill-client.js";
export type { ConnectOptions } from "./src/client/drill-client.js";
export { columnValues } from "./src/client/response.js";
export { listObjects, listSchemas } from "./src/catalog/catalog.js";
export type { QueryRunner } from "./src/catalog/catalog.js";
export { convertTemporalValue, isTemporalType, temporalTypeOf } from "./src/convert/temporal.js";
export type { TemporalType } from "./src/convert/temporal.js";
export { getConfig, resetConfig } from "./src/state/config.js";
export type { DrillDataConfig, LogLevel } from "./src/state/config.js";
export {
  AuthenticationError,
  ConfigurationError,
  DrillClientError,
  NotFoundError,
  QueryError,
  ResponseFormatError,
  SessionClosedError,
  TemporalConversionError,
} from "./src/utils/errors.js";
export type {
  Column,
  ExecuteOptions,
  ObjectDescriptor,
  ObjectType,
  ResultRow,
  ResultTable,
  Session,
} from "./src/utils/types.js";
