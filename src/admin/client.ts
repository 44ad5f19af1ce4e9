import { AdminError } from "../error";
import { logger } from "../logger";
import { Backup } from "./backup";
import { Database } from "./database";
import { HttpTransport } from "./httpTransport";
import {
  BackupId,
  DatabaseId,
  InstanceId,
  validateBackupId,
  validateDatabaseId,
} from "./ids";
import { Instance } from "./instance";
import {
  CreateBackupMetadata,
  CreateDatabaseMetadata,
  MetadataKind,
  MetadataTypes,
  RestoreDatabaseMetadata,
  UpdateDatabaseDdlMetadata,
  unpackOptional,
} from "./metadata";
import { OperationHandle } from "./operation";
import { ListOptions, OperationEntry, PagedList } from "./page";
import { OperationKind, PollingOverrides, retrySettingsFor } from "./retrySettings";
import { ListRequest, PagedMethod, PagedMethods, Transport } from "./transport";
import {
  Any,
  BackupResourceSchema,
  DatabaseResourceSchema,
  Operation,
  decode,
  toTimestamp,
} from "./types";

const OPERATION_ID_PATTERN = /^[a-z][a-z0-9_]*$/;

/**
 * Result and metadata types of each kind of long-running operation.
 */
export interface OperationTypes {
  createDatabase: { result: Database; metadata: CreateDatabaseMetadata };
  createBackup: { result: Backup; metadata: CreateBackupMetadata };
  restoreDatabase: { result: Database; metadata: RestoreDatabaseMetadata };
  updateDdl: { result: void; metadata: UpdateDatabaseDdlMetadata };
}

export type HandleFor<K extends OperationKind> = OperationHandle<
  OperationTypes[K]["result"],
  OperationTypes[K]["metadata"]
>;

type HandleFactories = { [K in OperationKind]: (operation: Operation) => HandleFor<K> };

export interface DatabaseAdminClientOptions {
  projectId: string;
  /** Defaults to an HttpTransport configured from the environment. */
  transport?: Transport;
  /** Polling settings per kind of operation, on top of the defaults. */
  polling?: PollingOverrides;
}

function invalidArgument(message: string): AdminError {
  return new AdminError(message, { code: "INVALID_ARGUMENT" });
}

function validateStatements(statements: string[]): void {
  if (!statements.length) {
    throw invalidArgument("At least one DDL statement is required.");
  }
  statements.forEach((statement, i) => {
    if (!statement.trim()) {
      throw invalidArgument(`DDL statement ${i} is empty.`);
    }
  });
}

/**
 * Entry point for database and backup administration in one project. Operations that
 * take a while on the server return an OperationHandle to poll or await.
 */
export class DatabaseAdminClient {
  readonly projectId: string;

  private readonly transport: Transport;
  private readonly polling: PollingOverrides;

  private readonly handles: HandleFactories = {
    createDatabase: (op) =>
      this.handle(op, "createDatabase", "CreateDatabaseMetadata", (r) => this.toDatabase(r)),
    createBackup: (op) =>
      this.handle(op, "createBackup", "CreateBackupMetadata", (r) => this.toBackup(r)),
    restoreDatabase: (op) =>
      this.handle(op, "restoreDatabase", "RestoreDatabaseMetadata", (r) => this.toDatabase(r)),
    updateDdl: (op) =>
      this.handle(op, "updateDdl", "UpdateDatabaseDdlMetadata", (): void => undefined),
  };

  constructor(options: DatabaseAdminClientOptions) {
    if (!options.projectId) {
      throw invalidArgument("A project id is required.");
    }
    this.projectId = options.projectId;
    this.transport = options.transport ?? new HttpTransport();
    this.polling = options.polling ?? {};
  }

  instance(instanceId: string): Instance {
    return new Instance(this, this.instanceId(instanceId));
  }

  /**
   * A reference to a database, without fetching it.
   */
  newDatabase(id: DatabaseId): Database {
    this.checkProject(id);
    return new Database(this, id);
  }

  /**
   * A reference to a backup, without fetching it. Call create() on it to start the backup.
   */
  newBackup(
    id: BackupId,
    info: { database?: DatabaseId; expireTime?: Date | string } = {},
  ): Backup {
    this.checkProject(id);
    return new Backup(this, id, {
      database: info.database,
      expireTime: info.expireTime === undefined ? undefined : toTimestamp(info.expireTime),
    });
  }

  /**
   * Starts creating `databaseId` in the instance, running `statements` once it exists.
   */
  async createDatabase(
    instanceId: string,
    databaseId: string,
    statements: string[] = [],
  ): Promise<HandleFor<"createDatabase">> {
    validateDatabaseId(databaseId);
    const operation = await this.transport.unaryCall("CreateDatabase", {
      parent: this.instanceId(instanceId).name,
      createStatement: `CREATE DATABASE \`${databaseId}\``,
      extraStatements: statements,
    });
    return this.started("createDatabase", operation);
  }

  async createBackup(
    instanceId: string,
    backupId: string,
    databaseId: string,
    expireTime: Date | string,
  ): Promise<HandleFor<"createBackup">> {
    validateBackupId(backupId);
    if (!expireTime) {
      throw invalidArgument(`Backup ${backupId} needs an expire time.`);
    }
    const operation = await this.transport.unaryCall("CreateBackup", {
      parent: this.instanceId(instanceId).name,
      backupId,
      backup: {
        database: DatabaseId.of(this.projectId, instanceId, databaseId).name,
        expireTime: toTimestamp(expireTime),
      },
    });
    return this.started("createBackup", operation);
  }

  /**
   * Starts restoring a backup into a new database. The server follows a successful restore
   * with an optimize operation of its own, visible in database operation listings.
   */
  async restoreDatabase(
    backupInstanceId: string,
    backupId: string,
    targetInstanceId: string,
    targetDatabaseId: string,
  ): Promise<HandleFor<"restoreDatabase">> {
    validateDatabaseId(targetDatabaseId);
    const operation = await this.transport.unaryCall("RestoreDatabase", {
      parent: this.instanceId(targetInstanceId).name,
      databaseId: targetDatabaseId,
      backup: BackupId.of(this.projectId, backupInstanceId, backupId).name,
    });
    return this.started("restoreDatabase", operation);
  }

  /**
   * Starts applying DDL statements to a database. An `operationId`, when given, names the
   * operation so that a retried request is not applied twice.
   */
  async updateDdl(
    instanceId: string,
    databaseId: string,
    statements: string[],
    operationId?: string,
  ): Promise<HandleFor<"updateDdl">> {
    validateStatements(statements);
    if (operationId !== undefined && !OPERATION_ID_PATTERN.test(operationId)) {
      throw invalidArgument(
        `Invalid operation id "${operationId}": must match ${OPERATION_ID_PATTERN.source}.`,
      );
    }
    const operation = await this.transport.unaryCall("UpdateDatabaseDdl", {
      database: DatabaseId.of(this.projectId, instanceId, databaseId).name,
      statements,
      operationId,
    });
    return this.started("updateDdl", operation);
  }

  async getDatabase(instanceId: string, databaseId: string): Promise<Database> {
    const resource = await this.transport.unaryCall("GetDatabase", {
      name: DatabaseId.of(this.projectId, instanceId, databaseId).name,
    });
    return Database.fromResource(this, resource);
  }

  async getDatabaseDdl(instanceId: string, databaseId: string): Promise<string[]> {
    const ddl = await this.transport.unaryCall("GetDatabaseDdl", {
      database: DatabaseId.of(this.projectId, instanceId, databaseId).name,
    });
    return ddl.statements;
  }

  async dropDatabase(instanceId: string, databaseId: string): Promise<void> {
    await this.transport.unaryCall("DropDatabase", {
      database: DatabaseId.of(this.projectId, instanceId, databaseId).name,
    });
  }

  async getBackup(instanceId: string, backupId: string): Promise<Backup> {
    const resource = await this.transport.unaryCall("GetBackup", {
      name: BackupId.of(this.projectId, instanceId, backupId).name,
    });
    return Backup.fromResource(this, resource);
  }

  /**
   * Sets a backup's expire time and resolves with the updated backup.
   */
  async updateBackup(
    instanceId: string,
    backupId: string,
    expireTime: Date | string,
  ): Promise<Backup> {
    const resource = await this.transport.unaryCall("UpdateBackup", {
      backup: {
        name: BackupId.of(this.projectId, instanceId, backupId).name,
        expireTime: toTimestamp(expireTime),
      },
      updateMask: ["expire_time"],
    });
    return Backup.fromResource(this, resource);
  }

  /**
   * Deletes a backup. Deleting one that does not exist fails with NOT_FOUND.
   */
  async deleteBackup(instanceId: string, backupId: string): Promise<void> {
    await this.transport.unaryCall("DeleteBackup", {
      name: BackupId.of(this.projectId, instanceId, backupId).name,
    });
  }

  listDatabases(instanceId: string, options: ListOptions = {}): PagedList<Database> {
    return this.paged("ListDatabases", this.listRequest(instanceId, options), (resource) =>
      Database.fromResource(this, resource),
    );
  }

  listBackups(instanceId: string, options: ListOptions = {}): PagedList<Backup> {
    return this.paged("ListBackups", this.listRequest(instanceId, options), (resource) =>
      Backup.fromResource(this, resource),
    );
  }

  listDatabaseOperations(
    instanceId: string,
    options: ListOptions = {},
  ): PagedList<OperationEntry> {
    return this.paged(
      "ListDatabaseOperations",
      this.listRequest(instanceId, options),
      (operation) => new OperationEntry(operation),
    );
  }

  listBackupOperations(instanceId: string, options: ListOptions = {}): PagedList<OperationEntry> {
    return this.paged(
      "ListBackupOperations",
      this.listRequest(instanceId, options),
      (operation) => new OperationEntry(operation),
    );
  }

  async getOperation(name: string): Promise<OperationEntry> {
    return new OperationEntry(await this.transport.unaryCall("GetOperation", { name }));
  }

  /**
   * Re-attaches to an operation by name, e.g. one started by another process or one whose
   * earlier wait timed out.
   */
  async resumeOperation<K extends OperationKind>(name: string, kind: K): Promise<HandleFor<K>> {
    const operation = await this.transport.unaryCall("GetOperation", { name });
    return this.handles[kind](operation);
  }

  /**
   * Asks the server to cancel an operation. Resolves once the request is accepted, not when
   * the operation stops; the operation may still complete successfully.
   */
  async cancelOperation(name: string): Promise<void> {
    logger.debug(`[admin] Cancelling operation ${name}`);
    await this.transport.unaryCall("CancelOperation", { name });
  }

  private started<K extends OperationKind>(kind: K, operation: Operation): HandleFor<K> {
    logger.debug(`[admin] Started ${kind} operation ${operation.name}`);
    return this.handles[kind](operation);
  }

  private handle<R, K extends MetadataKind>(
    operation: Operation,
    kind: OperationKind,
    metadataKind: K,
    decodeResult: (response: Any | undefined) => R,
  ): OperationHandle<R, MetadataTypes[K]> {
    return new OperationHandle({
      transport: this.transport,
      operation,
      retrySettings: retrySettingsFor(kind, this.polling[kind]),
      decodeMetadata: (envelope) => unpackOptional(envelope, metadataKind),
      decodeResult,
    });
  }

  private paged<M extends PagedMethod, T>(
    method: M,
    request: ListRequest,
    toItem: (raw: PagedMethods[M]) => T,
  ): PagedList<T> {
    return new PagedList(async (pageToken) => {
      const res = await this.transport.pagedCall(method, request, pageToken);
      return { items: res.items.map(toItem), nextPageToken: res.nextPageToken };
    });
  }

  private listRequest(instanceId: string, options: ListOptions): ListRequest {
    return {
      parent: this.instanceId(instanceId).name,
      filter: options.filter,
      pageSize: options.pageSize,
    };
  }

  private instanceId(instanceId: string): InstanceId {
    return InstanceId.of(this.projectId, instanceId);
  }

  private checkProject(id: DatabaseId | BackupId): void {
    if (id.project !== this.projectId) {
      throw invalidArgument(
        `${id.name} belongs to project ${id.project}, not ${this.projectId}.`,
      );
    }
  }

  private toDatabase(response: Any | undefined): Database {
    return Database.fromResource(this, decode(DatabaseResourceSchema, response, "database"));
  }

  private toBackup(response: Any | undefined): Backup {
    return Backup.fromResource(this, decode(BackupResourceSchema, response, "backup"));
  }
}
