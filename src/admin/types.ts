import { z } from "zod";

import { MalformedResponseError } from "../error";

export const TYPE_URL_PREFIX = "type.googleapis.com/google.spanner.admin.database.v1.";

/** google.rpc.Status */
export const StatusSchema = z.object({
  code: z.number().optional(),
  message: z.string().optional(),
  details: z.array(z.unknown()).optional(),
});
export type Status = z.infer<typeof StatusSchema>;

/** google.protobuf.Any, as rendered in JSON. */
export const AnySchema = z.object({ "@type": z.string() }).passthrough();
export type Any = z.infer<typeof AnySchema>;

/** google.longrunning.Operation */
export const OperationSchema = z.object({
  name: z.string(),
  metadata: AnySchema.optional(),
  done: z.boolean().optional(),
  error: StatusSchema.optional(),
  response: AnySchema.optional(),
});
export type Operation = z.infer<typeof OperationSchema>;

export const DatabaseResourceSchema = z.object({
  name: z.string(),
  state: z.string().optional(),
  createTime: z.string().optional(),
  restoreInfo: z
    .object({
      sourceType: z.string().optional(),
      backupInfo: z
        .object({
          backup: z.string().optional(),
          sourceDatabase: z.string().optional(),
          createTime: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
});
export type DatabaseResource = z.infer<typeof DatabaseResourceSchema>;

export const BackupResourceSchema = z.object({
  name: z.string(),
  database: z.string().optional(),
  expireTime: z.string().optional(),
  createTime: z.string().optional(),
  // int64 fields arrive as strings.
  sizeBytes: z.union([z.string(), z.number()]).optional(),
  state: z.string().optional(),
  referencingDatabases: z.array(z.string()).optional(),
});
export type BackupResource = z.infer<typeof BackupResourceSchema>;

export const DatabaseDdlSchema = z.object({
  statements: z.array(z.string()).default([]),
});
export type DatabaseDdl = z.infer<typeof DatabaseDdlSchema>;

/**
 * Validates a response body, turning a mismatch into a MalformedResponseError.
 */
export function decode<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  what: string,
): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new MalformedResponseError(
      `Unexpected ${what} in response: ${result.error.message}`,
      result.error,
    );
  }
  return result.data;
}

export type ResourceState = "UNSPECIFIED" | "CREATING" | "READY";

/**
 * Maps a server-reported state onto the states callers see. READY_OPTIMIZING counts as READY.
 */
export function resourceState(state: string | undefined): ResourceState {
  switch (state) {
    case "CREATING":
      return "CREATING";
    case "READY":
    case "READY_OPTIMIZING":
      return "READY";
    default:
      return "UNSPECIFIED";
  }
}

/** RFC 3339 form of a timestamp accepted as a Date or as a string. */
export function toTimestamp(value: Date | string): string {
  return typeof value === "string" ? value : value.toISOString();
}
