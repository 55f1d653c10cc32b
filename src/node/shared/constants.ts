/**
 * Protocol and timing constants shared by the notifier and the endpoint.
 */

/** Path of the update endpoint, relative to the service base URL */
export const UPDATE_ENDPOINT_PATH = 'tracked-branch/update'

export const DEFAULT_CONNECTION_TIMEOUT_MS = 5_000

export const DEFAULT_UPDATE_TIMEOUT_MS = 30_000

/** Added to the connect deadline for the triggering request */
export const TRIGGER_GRACE_MS = 500

/** Interval between status polls */
export const POLL_INTERVAL_MS = 500

export const DEFAULT_SERVER_PORT = 8080
