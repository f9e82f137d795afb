/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation and merging happen in `loadLoggingConfig`;
 * later sources override earlier ones, and `undefined` means "not provided".
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env", "dotenv:.env", "json:logging.json". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
