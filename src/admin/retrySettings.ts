import * as _ from "lodash";

import { DEFAULT_RETRY_SETTINGS, RetrySettings } from "../operation-poller";

export type OperationKind = "createDatabase" | "createBackup" | "restoreDatabase" | "updateDdl";

export type PollingOverrides = Partial<Record<OperationKind, Partial<RetrySettings>>>;

export const DEFAULT_POLLING: Readonly<Record<OperationKind, RetrySettings>> = {
  createDatabase: DEFAULT_RETRY_SETTINGS,
  createBackup: DEFAULT_RETRY_SETTINGS,
  restoreDatabase: DEFAULT_RETRY_SETTINGS,
  // Schema changes usually finish in seconds.
  updateDdl: { ...DEFAULT_RETRY_SETTINGS, maxRetryDelayMillis: 10000 },
};

/**
 * Settings for polling `kind`, with later overrides winning. Undefined fields are ignored.
 */
export function retrySettingsFor(
  kind: OperationKind,
  ...overrides: Array<Partial<RetrySettings> | undefined>
): RetrySettings {
  return overrides.reduce<RetrySettings>(
    (settings, override) => ({ ...settings, ..._.omitBy(override, _.isUndefined) }),
    { ...DEFAULT_POLLING[kind] },
  );
}
