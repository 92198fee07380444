import type {ZodError} from 'zod';

export type ProvisioningErrorCode = 'validation_error' | 'not_found' | 'in_use' | 'conflict';

export type ValidationReason =
  | 'invalid_identifier'
  | 'invalid_record'
  | 'invalid_certificate'
  | 'invalid_pattern'
  | 'invalid_redirect';

export type ProvisioningResource = 'session' | 'certificate' | 'route';

export class ProvisioningError extends Error {
  public readonly code: ProvisioningErrorCode;

  public constructor(code: ProvisioningErrorCode, message: string) {
    super(message);
    this.name = 'ProvisioningError';
    this.code = code;
  }
}

export class ValidationError extends ProvisioningError {
  public readonly reason: ValidationReason;
  public readonly issues: string[];

  public constructor(reason: ValidationReason, issues: string[]) {
    super('validation_error', issues.length > 0 ? issues.join('; ') : 'Validation failed');
    this.name = 'ValidationError';
    this.reason = reason;
    this.issues = issues;
  }

  public static fromZod(reason: ValidationReason, error: ZodError) {
    return new ValidationError(
      reason,
      error.issues.map(issue => {
        const path = issue.path.map(String).join('.');
        return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
      })
    );
  }
}

export class NotFoundError extends ProvisioningError {
  public readonly resource: ProvisioningResource;
  public readonly id: string;

  public constructor(resource: ProvisioningResource, id: string) {
    super('not_found', `Unknown ${resource} ${id}`);
    this.name = 'NotFoundError';
    this.resource = resource;
    this.id = id;
  }
}

export class ConflictError extends ProvisioningError {
  public readonly resource: ProvisioningResource;
  public readonly id: string;

  public constructor(resource: ProvisioningResource, id: string) {
    super('conflict', `${resource === 'session' ? 'Provisioning session' : 'Certificate'} ${id} already exists`);
    this.name = 'ConflictError';
    this.resource = resource;
    this.id = id;
  }
}

/** Certificate deletion blocked by distributions that still reference it. */
export class InUseError extends ProvisioningError {
  public readonly certificateId: string;
  public readonly sessionIds: string[];

  public constructor(certificateId: string, sessionIds: string[]) {
    super('in_use', `Certificate ${certificateId} is referenced by ${sessionIds.join(', ')}`);
    this.name = 'InUseError';
    this.certificateId = certificateId;
    this.sessionIds = sessionIds;
  }
}
