import type { Backup } from "./backup";
import type { DatabaseAdminClient } from "./client";
import type { Database } from "./database";
import { BackupId, DatabaseId, InstanceId } from "./ids";
import type { CreateDatabaseMetadata } from "./metadata";
import type { OperationHandle } from "./operation";
import { ListOptions, OperationEntry, PagedList } from "./page";

/**
 * The databases, backups and operations of one instance.
 */
export class Instance {
  constructor(
    private readonly client: DatabaseAdminClient,
    readonly id: InstanceId,
  ) {}

  createDatabase(
    databaseId: string,
    statements: string[] = [],
  ): Promise<OperationHandle<Database, CreateDatabaseMetadata>> {
    return this.client.createDatabase(this.id.instance, databaseId, statements);
  }

  getDatabase(databaseId: string): Promise<Database> {
    return this.client.getDatabase(this.id.instance, databaseId);
  }

  getBackup(backupId: string): Promise<Backup> {
    return this.client.getBackup(this.id.instance, backupId);
  }

  databaseId(databaseId: string): DatabaseId {
    return DatabaseId.of(this.id, databaseId);
  }

  backupId(backupId: string): BackupId {
    return BackupId.of(this.id, backupId);
  }

  listDatabases(options: ListOptions = {}): PagedList<Database> {
    return this.client.listDatabases(this.id.instance, options);
  }

  listBackups(options: ListOptions = {}): PagedList<Backup> {
    return this.client.listBackups(this.id.instance, options);
  }

  listDatabaseOperations(options: ListOptions = {}): PagedList<OperationEntry> {
    return this.client.listDatabaseOperations(this.id.instance, options);
  }

  listBackupOperations(options: ListOptions = {}): PagedList<OperationEntry> {
    return this.client.listBackupOperations(this.id.instance, options);
  }
}
