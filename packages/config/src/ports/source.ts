/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation, coercion and defaults belong to the schema
 * handed to `loadConfig`. Sources are applied in order; later ones win.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "dotenv:.env.production". */
  readonly name: string

  /**
   * Load flat key/value pairs. A key mapped to `undefined` counts as not
   * provided.
   */
  load(): Promise<Record<string, string | undefined>>
}
