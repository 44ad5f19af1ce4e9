import { AdminError } from "../error";
import type { DatabaseAdminClient } from "./client";
import type { Backup } from "./backup";
import { DatabaseId } from "./ids";
import type { CreateBackupMetadata, UpdateDatabaseDdlMetadata } from "./metadata";
import type { OperationHandle } from "./operation";
import { ListOptions, OperationEntry, PagedList, combineFilters } from "./page";
import { DatabaseResource, ResourceState, resourceState } from "./types";

export interface DatabaseInfo {
  state?: ResourceState;
  createTime?: string;
  /** Name of the backup this database was restored from, if any. */
  restoredFrom?: string;
}

/**
 * Snapshot of a database as of its last fetch. Methods act on the database it identifies
 * through the client it was obtained from.
 */
export class Database {
  readonly state: ResourceState;
  readonly createTime: string | undefined;
  readonly restoredFrom: string | undefined;

  constructor(
    private readonly client: DatabaseAdminClient,
    readonly id: DatabaseId,
    info: DatabaseInfo = {},
  ) {
    this.state = info.state ?? "UNSPECIFIED";
    this.createTime = info.createTime;
    this.restoredFrom = info.restoredFrom;
  }

  static fromResource(client: DatabaseAdminClient, resource: DatabaseResource): Database {
    return new Database(client, DatabaseId.parse(resource.name), {
      state: resourceState(resource.state),
      createTime: resource.createTime,
      restoredFrom: resource.restoreInfo?.backupInfo?.backup,
    });
  }

  reload(): Promise<Database> {
    return this.client.getDatabase(this.id.instance, this.id.database);
  }

  async exists(): Promise<boolean> {
    try {
      await this.reload();
      return true;
    } catch (err: unknown) {
      if (err instanceof AdminError && err.code === "NOT_FOUND") {
        return false;
      }
      throw err;
    }
  }

  backup(options: {
    backupId: string;
    expireTime: Date | string;
  }): Promise<OperationHandle<Backup, CreateBackupMetadata>> {
    return this.client.createBackup(
      this.id.instance,
      options.backupId,
      this.id.database,
      options.expireTime,
    );
  }

  updateDdl(
    statements: string[],
    operationId?: string,
  ): Promise<OperationHandle<void, UpdateDatabaseDdlMetadata>> {
    return this.client.updateDdl(this.id.instance, this.id.database, statements, operationId);
  }

  getDdl(): Promise<string[]> {
    return this.client.getDatabaseDdl(this.id.instance, this.id.database);
  }

  drop(): Promise<void> {
    return this.client.dropDatabase(this.id.instance, this.id.database);
  }

  /**
   * Operations on this database, optionally narrowed further by `options.filter`.
   */
  listDatabaseOperations(options: ListOptions = {}): PagedList<OperationEntry> {
    return this.client.listDatabaseOperations(this.id.instance, {
      ...options,
      filter: combineFilters(`name:databases/${this.id.database}`, options.filter),
    });
  }

  equals(other: Database): boolean {
    return this.id.equals(other.id);
  }

  toString(): string {
    return this.id.name;
  }
}
