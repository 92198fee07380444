export type RedirectTableErrorCode = 'invalid_prefix' | 'invalid_path';

export class RedirectTableError extends Error {
  public readonly code: RedirectTableErrorCode;

  public constructor(code: RedirectTableErrorCode, message: string) {
    super(message);
    this.name = 'RedirectTableError';
    this.code = code;
  }
}
