export { DatabaseAdminClient } from "./admin/client";
export type { DatabaseAdminClientOptions, HandleFor, OperationTypes } from "./admin/client";
export { Database } from "./admin/database";
export type { DatabaseInfo } from "./admin/database";
export { Backup } from "./admin/backup";
export type { BackupInfo } from "./admin/backup";
export { Instance } from "./admin/instance";
export {
  BackupId,
  DatabaseId,
  InstanceId,
  validateBackupId,
  validateDatabaseId,
} from "./admin/ids";
export { typeUrl, unpack, unpackOptional } from "./admin/metadata";
export type {
  CreateBackupMetadata,
  CreateDatabaseMetadata,
  MetadataKind,
  MetadataTypes,
  OperationProgress,
  OptimizeRestoredDatabaseMetadata,
  RestoreDatabaseMetadata,
  UpdateDatabaseDdlMetadata,
} from "./admin/metadata";
export { OperationHandle } from "./admin/operation";
export type { OperationSnapshot, OperationState } from "./admin/operation";
export { OperationEntry, Page, PagedList } from "./admin/page";
export type { ListOptions } from "./admin/page";
export { DEFAULT_POLLING } from "./admin/retrySettings";
export type { OperationKind, PollingOverrides } from "./admin/retrySettings";
export type {
  CallOptions,
  ListRequest,
  PageResult,
  PagedMethod,
  PagedMethods,
  Transport,
  UnaryMethod,
  UnaryMethods,
} from "./admin/transport";
export { HttpTransport } from "./admin/httpTransport";
export type { HttpTransportOptions } from "./admin/httpTransport";
export type {
  Any,
  BackupResource,
  DatabaseResource,
  Operation,
  ResourceState,
  Status,
} from "./admin/types";
export { setAccessToken } from "./apiv2";
export {
  AdminError,
  InvalidMetadataTypeError,
  MalformedIdentifierError,
  MalformedResponseError,
} from "./error";
export type { ErrorCode, Result } from "./error";
export { logger, useConsoleLoggers, useFileLogger } from "./logger";
export { DEFAULT_RETRY_SETTINGS } from "./operation-poller";
export type { RetrySettings } from "./operation-poller";
export { default as RetriesExhaustedError } from "./throttler/errors/retries-exhausted-error";
export { default as TimeoutError } from "./throttler/errors/timeout-error";
