/**
 * A prefix that scopes an adapter instance to a partition of a shared keyspace
 * (e.g. one Redis database serving several services).
 *
 * Adapters treat this value as an opaque string and prepend it to every key.
 *
 * @example "prod:weather-proxy:"
 */
export type KeyspacePrefix = string
