import { AdminError } from "../error";
import type { DatabaseAdminClient } from "./client";
import type { Database } from "./database";
import { BackupId, DatabaseId } from "./ids";
import type { CreateBackupMetadata, RestoreDatabaseMetadata } from "./metadata";
import type { OperationHandle } from "./operation";
import { ListOptions, OperationEntry, PagedList, combineFilters } from "./page";
import { BackupResource, ResourceState, resourceState, toTimestamp } from "./types";

export interface BackupInfo {
  database?: DatabaseId;
  state?: ResourceState;
  expireTime?: string;
  createTime?: string;
  sizeBytes?: number;
  referencingDatabases?: string[];
}

/**
 * Snapshot of a backup as of its last fetch. `createTime` and `sizeBytes` are only
 * set once the backup is READY.
 */
export class Backup {
  readonly database: DatabaseId | undefined;
  readonly state: ResourceState;
  readonly expireTime: string | undefined;
  readonly createTime: string | undefined;
  readonly sizeBytes: number | undefined;
  readonly referencingDatabases: readonly string[];

  constructor(
    private readonly client: DatabaseAdminClient,
    readonly id: BackupId,
    info: BackupInfo = {},
  ) {
    this.database = info.database;
    this.state = info.state ?? "UNSPECIFIED";
    this.expireTime = info.expireTime;
    this.createTime = info.createTime;
    this.sizeBytes = info.sizeBytes;
    this.referencingDatabases = info.referencingDatabases ?? [];
  }

  static fromResource(client: DatabaseAdminClient, resource: BackupResource): Backup {
    return new Backup(client, BackupId.parse(resource.name), {
      database: resource.database ? DatabaseId.parse(resource.database) : undefined,
      state: resourceState(resource.state),
      expireTime: resource.expireTime,
      createTime: resource.createTime,
      sizeBytes: resource.sizeBytes === undefined ? undefined : Number(resource.sizeBytes),
      referencingDatabases: resource.referencingDatabases,
    });
  }

  isReady(): boolean {
    return this.state === "READY";
  }

  /**
   * Starts creating this backup from `database` with `expireTime`; both must be set.
   */
  create(): Promise<OperationHandle<Backup, CreateBackupMetadata>> {
    if (!this.database) {
      return Promise.reject(
        new AdminError(`Backup ${this.id.backup} has no source database`, {
          code: "INVALID_ARGUMENT",
        }),
      );
    }
    if (!this.expireTime) {
      return Promise.reject(
        new AdminError(`Backup ${this.id.backup} has no expire time`, {
          code: "INVALID_ARGUMENT",
        }),
      );
    }
    return this.client.createBackup(
      this.id.instance,
      this.id.backup,
      this.database.database,
      this.expireTime,
    );
  }

  reload(): Promise<Backup> {
    return this.client.getBackup(this.id.instance, this.id.backup);
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

  delete(): Promise<void> {
    return this.client.deleteBackup(this.id.instance, this.id.backup);
  }

  /**
   * Sets the expire time on the server, to `expireTime` or to this snapshot's own value.
   * Resolves with the updated backup.
   */
  updateExpireTime(expireTime?: Date | string): Promise<Backup> {
    const value = expireTime ?? this.expireTime;
    if (!value) {
      return Promise.reject(
        new AdminError(`Backup ${this.id.backup} has no expire time`, {
          code: "INVALID_ARGUMENT",
        }),
      );
    }
    return this.client.updateBackup(this.id.instance, this.id.backup, toTimestamp(value));
  }

  restore(target: DatabaseId): Promise<OperationHandle<Database, RestoreDatabaseMetadata>> {
    return this.client.restoreDatabase(
      this.id.instance,
      this.id.backup,
      target.instance,
      target.database,
    );
  }

  /**
   * Operations on this backup, optionally narrowed further by `options.filter`.
   */
  listBackupOperations(options: ListOptions = {}): PagedList<OperationEntry> {
    return this.client.listBackupOperations(this.id.instance, {
      ...options,
      filter: combineFilters(`name:backups/${this.id.backup}`, options.filter),
    });
  }

  equals(other: Backup): boolean {
    return this.id.equals(other.id);
  }

  toString(): string {
    return this.id.name;
  }
}
