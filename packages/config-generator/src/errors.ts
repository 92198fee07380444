export type ConfigGenerationErrorCode =
  | 'ingest_unresolved'
  | 'certificate_path_missing'
  | 'duplicate_location'
  | 'rewrite_rule_invalid'
  | 'unsafe_value';

export class ConfigGenerationError extends Error {
  public readonly code: ConfigGenerationErrorCode;

  public constructor(code: ConfigGenerationErrorCode, message: string) {
    super(message);
    this.name = 'ConfigGenerationError';
    this.code = code;
  }
}
