import { z } from "zod";

import { AdminError, InvalidMetadataTypeError } from "../error";
import { Any, TYPE_URL_PREFIX } from "./types";

export const OperationProgressSchema = z.object({
  progressPercent: z.number().optional(),
  startTime: z.string().optional(),
  endTime: z.string().optional(),
});
export type OperationProgress = z.infer<typeof OperationProgressSchema>;

const CreateDatabaseMetadataSchema = z.object({
  database: z.string().optional(),
});

const CreateBackupMetadataSchema = z.object({
  name: z.string().optional(),
  database: z.string().optional(),
  progress: OperationProgressSchema.optional(),
  cancelTime: z.string().optional(),
});

const RestoreDatabaseMetadataSchema = z.object({
  name: z.string().optional(),
  sourceType: z.string().optional(),
  backupInfo: z
    .object({
      backup: z.string().optional(),
      sourceDatabase: z.string().optional(),
      createTime: z.string().optional(),
    })
    .optional(),
  progress: OperationProgressSchema.optional(),
  cancelTime: z.string().optional(),
  optimizeDatabaseOperationName: z.string().optional(),
});

const OptimizeRestoredDatabaseMetadataSchema = z.object({
  name: z.string().optional(),
  progress: OperationProgressSchema.optional(),
});

const UpdateDatabaseDdlMetadataSchema = z.object({
  database: z.string().optional(),
  statements: z.array(z.string()).optional(),
  commitTimestamps: z.array(z.string()).optional(),
  throttled: z.boolean().optional(),
  progress: z.array(OperationProgressSchema).optional(),
});

export type CreateDatabaseMetadata = z.infer<typeof CreateDatabaseMetadataSchema>;
export type CreateBackupMetadata = z.infer<typeof CreateBackupMetadataSchema>;
export type RestoreDatabaseMetadata = z.infer<typeof RestoreDatabaseMetadataSchema>;
export type OptimizeRestoredDatabaseMetadata = z.infer<
  typeof OptimizeRestoredDatabaseMetadataSchema
>;
export type UpdateDatabaseDdlMetadata = z.infer<typeof UpdateDatabaseDdlMetadataSchema>;

export interface MetadataTypes {
  CreateDatabaseMetadata: CreateDatabaseMetadata;
  CreateBackupMetadata: CreateBackupMetadata;
  RestoreDatabaseMetadata: RestoreDatabaseMetadata;
  OptimizeRestoredDatabaseMetadata: OptimizeRestoredDatabaseMetadata;
  UpdateDatabaseDdlMetadata: UpdateDatabaseDdlMetadata;
}

export type MetadataKind = keyof MetadataTypes;

const SCHEMAS: { [K in MetadataKind]: z.ZodType<MetadataTypes[K], z.ZodTypeDef, unknown> } = {
  CreateDatabaseMetadata: CreateDatabaseMetadataSchema,
  CreateBackupMetadata: CreateBackupMetadataSchema,
  RestoreDatabaseMetadata: RestoreDatabaseMetadataSchema,
  OptimizeRestoredDatabaseMetadata: OptimizeRestoredDatabaseMetadataSchema,
  UpdateDatabaseDdlMetadata: UpdateDatabaseDdlMetadataSchema,
};

export function typeUrl(kind: MetadataKind): string {
  return TYPE_URL_PREFIX + kind;
}

/**
 * Decodes an operation's metadata envelope as `kind`.
 * @throws InvalidMetadataTypeError when the envelope was packed as another type.
 */
export function unpack<K extends MetadataKind>(
  envelope: Any | undefined,
  kind: K,
): MetadataTypes[K] {
  const expected = typeUrl(kind);
  const actual = envelope?.["@type"];
  if (actual !== expected) {
    throw new InvalidMetadataTypeError(expected, actual);
  }
  const result = SCHEMAS[kind].safeParse(envelope);
  if (!result.success) {
    throw new AdminError(`Malformed ${kind}: ${result.error.message}`, {
      code: "UNKNOWN",
      original: result.error,
    });
  }
  return result.data;
}

/**
 * Like unpack, but an absent envelope yields undefined.
 */
export function unpackOptional<K extends MetadataKind>(
  envelope: Any | undefined,
  kind: K,
): MetadataTypes[K] | undefined {
  return envelope ? unpack(envelope, kind) : undefined;
}
