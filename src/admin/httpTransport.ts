import { z } from "zod";

import { adminApiVersion, adminOrigin } from "../api";
import { Client, ClientVerbOptions } from "../apiv2";
import {
  CallOptions,
  ListRequest,
  PageResult,
  PagedHandlers,
  PagedMethod,
  PagedMethods,
  Transport,
  UnaryHandlers,
  UnaryMethod,
  UnaryMethods,
} from "./transport";
import {
  BackupResourceSchema,
  DatabaseDdlSchema,
  DatabaseResourceSchema,
  OperationSchema,
  decode,
} from "./types";

const ListDatabasesResponseSchema = z.object({
  databases: z.array(DatabaseResourceSchema).default([]),
  nextPageToken: z.string().optional(),
});

const ListBackupsResponseSchema = z.object({
  backups: z.array(BackupResourceSchema).default([]),
  nextPageToken: z.string().optional(),
});

const ListOperationsResponseSchema = z.object({
  operations: z.array(OperationSchema).default([]),
  nextPageToken: z.string().optional(),
});

export interface HttpTransportOptions {
  /** Defaults to DBADMIN_API_URL, or the public endpoint. */
  origin?: string;
  apiVersion?: string;
  accessToken?: string;
  /** HTTP statuses on which reads are retried by the REST client. */
  retryCodes?: number[];
}

/**
 * Transport over the admin service's JSON/REST surface.
 */
export class HttpTransport implements Transport {
  private readonly client: Client;
  private readonly retryCodes: number[];
  private readonly unary: UnaryHandlers;
  private readonly paged: PagedHandlers;

  constructor(options: HttpTransportOptions = {}) {
    this.client = new Client({
      urlPrefix: options.origin ?? adminOrigin,
      apiVersion: options.apiVersion ?? adminApiVersion,
      accessToken: options.accessToken,
    });
    this.retryCodes = options.retryCodes ?? [];

    this.unary = {
      CreateDatabase: async (req, opts) => {
        const res = await this.client.post<unknown, unknown>(
          `/${req.parent}/databases`,
          { createStatement: req.createStatement, extraStatements: req.extraStatements },
          this.verbOptions(opts),
        );
        return decode(OperationSchema, res.body, "operation");
      },
      GetDatabase: async (req, opts) => {
        const res = await this.client.get<unknown>(`/${req.name}`, this.readOptions(opts));
        return decode(DatabaseResourceSchema, res.body, "database");
      },
      DropDatabase: async (req, opts) => {
        await this.client.delete<unknown>(`/${req.database}`, this.verbOptions(opts));
      },
      GetDatabaseDdl: async (req, opts) => {
        const res = await this.client.get<unknown>(`/${req.database}/ddl`, this.readOptions(opts));
        return decode(DatabaseDdlSchema, res.body, "database DDL");
      },
      UpdateDatabaseDdl: async (req, opts) => {
        const res = await this.client.patch<unknown, unknown>(
          `/${req.database}/ddl`,
          { statements: req.statements, operationId: req.operationId },
          this.verbOptions(opts),
        );
        return decode(OperationSchema, res.body, "operation");
      },
      CreateBackup: async (req, opts) => {
        const res = await this.client.post<unknown, unknown>(`/${req.parent}/backups`, req.backup, {
          ...this.verbOptions(opts),
          queryParams: { backupId: req.backupId },
        });
        return decode(OperationSchema, res.body, "operation");
      },
      GetBackup: async (req, opts) => {
        const res = await this.client.get<unknown>(`/${req.name}`, this.readOptions(opts));
        return decode(BackupResourceSchema, res.body, "backup");
      },
      UpdateBackup: async (req, opts) => {
        const res = await this.client.patch<unknown, unknown>(`/${req.backup.name}`, req.backup, {
          ...this.verbOptions(opts),
          queryParams: { updateMask: req.updateMask.join(",") },
        });
        return decode(BackupResourceSchema, res.body, "backup");
      },
      DeleteBackup: async (req, opts) => {
        await this.client.delete<unknown>(`/${req.name}`, this.verbOptions(opts));
      },
      RestoreDatabase: async (req, opts) => {
        const res = await this.client.post<unknown, unknown>(
          `/${req.parent}/databases:restore`,
          { databaseId: req.databaseId, backup: req.backup },
          this.verbOptions(opts),
        );
        return decode(OperationSchema, res.body, "operation");
      },
      GetOperation: async (req, opts) => {
        const res = await this.client.get<unknown>(`/${req.name}`, this.readOptions(opts));
        return decode(OperationSchema, res.body, "operation");
      },
      CancelOperation: async (req, opts) => {
        await this.client.post<unknown, unknown>(`/${req.name}:cancel`, undefined, this.verbOptions(opts));
      },
    };

    this.paged = {
      ListDatabases: async (req, pageToken, opts) => {
        const body = await this.list(`/${req.parent}/databases`, req, pageToken, opts);
        const res = decode(ListDatabasesResponseSchema, body, "database list");
        return { items: res.databases, nextPageToken: res.nextPageToken };
      },
      ListBackups: async (req, pageToken, opts) => {
        const body = await this.list(`/${req.parent}/backups`, req, pageToken, opts);
        const res = decode(ListBackupsResponseSchema, body, "backup list");
        return { items: res.backups, nextPageToken: res.nextPageToken };
      },
      ListDatabaseOperations: async (req, pageToken, opts) => {
        const body = await this.list(`/${req.parent}/databaseOperations`, req, pageToken, opts);
        const res = decode(ListOperationsResponseSchema, body, "operation list");
        return { items: res.operations, nextPageToken: res.nextPageToken };
      },
      ListBackupOperations: async (req, pageToken, opts) => {
        const body = await this.list(`/${req.parent}/backupOperations`, req, pageToken, opts);
        const res = decode(ListOperationsResponseSchema, body, "operation list");
        return { items: res.operations, nextPageToken: res.nextPageToken };
      },
    };
  }

  unaryCall<M extends UnaryMethod>(
    method: M,
    request: UnaryMethods[M]["request"],
    options: CallOptions = {},
  ): Promise<UnaryMethods[M]["response"]> {
    return this.unary[method](request, options);
  }

  pagedCall<M extends PagedMethod>(
    method: M,
    request: ListRequest,
    pageToken?: string,
    options: CallOptions = {},
  ): Promise<PageResult<PagedMethods[M]>> {
    return this.paged[method](request, pageToken, options);
  }

  private async list(
    path: string,
    req: ListRequest,
    pageToken: string | undefined,
    opts: CallOptions,
  ): Promise<unknown> {
    const queryParams: Record<string, string | number> = {};
    if (req.filter) {
      queryParams.filter = req.filter;
    }
    if (req.pageSize) {
      queryParams.pageSize = req.pageSize;
    }
    if (pageToken) {
      queryParams.pageToken = pageToken;
    }
    const res = await this.client.get<unknown>(path, { ...this.readOptions(opts), queryParams });
    return res.body;
  }

  private verbOptions(opts: CallOptions): ClientVerbOptions {
    return opts.timeout ? { timeout: opts.timeout } : {};
  }

  private readOptions(opts: CallOptions): ClientVerbOptions {
    if (!this.retryCodes.length) {
      return this.verbOptions(opts);
    }
    return { ...this.verbOptions(opts), retryCodes: this.retryCodes };
  }
}
