/**
 * Raw serializer settings from one place, keyed without prefix (`LOG_LEVEL`).
 * Values stay unvalidated until `loadSerializerConfig` merges the sources.
 */
export interface ConfigSource {
  /** Shown in validation errors, e.g. `env:ENUMJSON_`. */
  readonly name: string

  /** `undefined` values leave earlier sources in place. */
  read(): Readonly<Record<string, unknown>>
}
