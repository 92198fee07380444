export {FileCertificateCache, MemoryCertificateCache, type CertificateCache} from './certificateCache';
export {
  ConflictError,
  InUseError,
  NotFoundError,
  ProvisioningError,
  ValidationError,
  type ProvisioningErrorCode,
  type ProvisioningResource,
  type ValidationReason
} from './errors';
export {SerialQueue} from './serialQueue';
export {
  ProvisioningStore,
  type ProvisioningSnapshot,
  type ProvisioningStoreOptions,
  type ProvisioningSupervisor,
  type PutExpectation,
  type PutResult
} from './store';
export {findRecordIssues, findStateIssues} from './validation';
