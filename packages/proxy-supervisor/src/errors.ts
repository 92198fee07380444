export type SupervisorErrorCode =
  | 'config_invalid'
  | 'startup_failed'
  | 'reload_failed'
  | 'upstream_failed'
  | 'invalid_state';

export class SupervisorError extends Error {
  public readonly code: SupervisorErrorCode;

  public constructor(code: SupervisorErrorCode, message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = 'SupervisorError';
    this.code = code;
  }
}

/** The proxy's own validator rejected the generated configuration. */
export class ConfigInvalidError extends SupervisorError {
  public readonly output: string;

  public constructor(output: string) {
    super('config_invalid', 'Proxy rejected the generated configuration');
    this.name = 'ConfigInvalidError';
    this.output = output;
  }
}

export class StartupError extends SupervisorError {
  public readonly attempts: number;

  public constructor(attempts: number, options?: {cause?: unknown}) {
    super('startup_failed', `Proxy did not become ready after ${attempts} attempt(s)`, options);
    this.name = 'StartupError';
    this.attempts = attempts;
  }
}

export class ReloadError extends SupervisorError {
  public readonly fatal: boolean;

  public constructor({fatal, restoredVersion}: {fatal: boolean; restoredVersion: string | null}) {
    super(
      'reload_failed',
      fatal
        ? 'Proxy reload failed and the previous configuration could not be restored'
        : `Proxy reload failed; configuration ${restoredVersion ?? 'unknown'} restored`
    );
    this.name = 'ReloadError';
    this.fatal = fatal;
  }
}

export class UpstreamError extends SupervisorError {
  public constructor(message: string, options?: {cause?: unknown}) {
    super('upstream_failed', message, options);
    this.name = 'UpstreamError';
  }
}

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));
