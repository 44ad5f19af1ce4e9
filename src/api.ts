import * as utils from "./utils";

export const adminOrigin = utils.envOverride("DBADMIN_API_URL", "https://spanner.googleapis.com");

export const adminApiVersion = utils.envOverride("DBADMIN_API_VERSION", "v1");

/** Default client-side budget for awaiting a long-running operation. */
export const lroTotalTimeoutMillis = utils.envOverride(
  "DBADMIN_LRO_TOTAL_TIMEOUT_MS",
  24 * 60 * 60 * 1000,
  utils.toPositiveMillis,
);

/** Default delay before the second poll of a long-running operation. */
export const lroInitialDelayMillis = utils.envOverride(
  "DBADMIN_LRO_INITIAL_DELAY_MS",
  1000,
  utils.toMillis,
);
