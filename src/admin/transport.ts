import { BackupResource, DatabaseDdl, DatabaseResource, Operation } from "./types";

/**
 * Request/response pairs of the admin service's unary methods.
 */
export interface UnaryMethods {
  CreateDatabase: {
    request: { parent: string; createStatement: string; extraStatements: string[] };
    response: Operation;
  };
  GetDatabase: { request: { name: string }; response: DatabaseResource };
  DropDatabase: { request: { database: string }; response: void };
  GetDatabaseDdl: { request: { database: string }; response: DatabaseDdl };
  UpdateDatabaseDdl: {
    request: { database: string; statements: string[]; operationId?: string };
    response: Operation;
  };
  CreateBackup: {
    request: { parent: string; backupId: string; backup: { database: string; expireTime: string } };
    response: Operation;
  };
  GetBackup: { request: { name: string }; response: BackupResource };
  UpdateBackup: {
    request: { backup: { name: string; expireTime: string }; updateMask: string[] };
    response: BackupResource;
  };
  DeleteBackup: { request: { name: string }; response: void };
  RestoreDatabase: {
    request: { parent: string; databaseId: string; backup: string };
    response: Operation;
  };
  GetOperation: { request: { name: string }; response: Operation };
  CancelOperation: { request: { name: string }; response: void };
}

export type UnaryMethod = keyof UnaryMethods;

/**
 * Item type of each paged listing method.
 */
export interface PagedMethods {
  ListDatabases: DatabaseResource;
  ListBackups: BackupResource;
  ListDatabaseOperations: Operation;
  ListBackupOperations: Operation;
}

export type PagedMethod = keyof PagedMethods;

export interface ListRequest {
  parent: string;
  /** Server-side filter expression, forwarded as is. */
  filter?: string;
  pageSize?: number;
}

export interface PageResult<T> {
  items: T[];
  nextPageToken?: string;
}

export interface CallOptions {
  /** Per-call timeout in milliseconds. */
  timeout?: number;
}

/**
 * The RPC surface the admin client is built on. Failures reject with an AdminError.
 */
export interface Transport {
  unaryCall<M extends UnaryMethod>(
    method: M,
    request: UnaryMethods[M]["request"],
    options?: CallOptions,
  ): Promise<UnaryMethods[M]["response"]>;

  pagedCall<M extends PagedMethod>(
    method: M,
    request: ListRequest,
    pageToken?: string,
    options?: CallOptions,
  ): Promise<PageResult<PagedMethods[M]>>;
}

export type UnaryHandlers = {
  [M in UnaryMethod]: (
    request: UnaryMethods[M]["request"],
    options: CallOptions,
  ) => Promise<UnaryMethods[M]["response"]>;
};

export type PagedHandlers = {
  [M in PagedMethod]: (
    request: ListRequest,
    pageToken: string | undefined,
    options: CallOptions,
  ) => Promise<PageResult<PagedMethods[M]>>;
};
