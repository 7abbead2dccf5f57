import type { DaemonErrorCode } from '../daemon/types.js';

export type UpdateErrorKind =
  | 'network-unavailable'
  | 'authentication-required'
  | 'permission-denied'
  | 'repository-signature-required'
  | 'eula-required'
  | 'locked-or-busy'
  | 'license-declined'
  | 'generic';

export type UpdateOperation = 'check' | 'install' | 'detail';

/**
 * A classified failure, as surfaced to subscribers and reflected in the
 * status message.
 */
export interface UpdateError {
  kind: UpdateErrorKind;
  operation: UpdateOperation;
  /** Raw daemon code, absent for locally raised errors */
  code?: DaemonErrorCode;
  details: string;
  message: string;
}

const KIND_LABELS: Record<UpdateErrorKind, string> = {
  'network-unavailable': 'Network is not available',
  'authentication-required': 'Authentication is required',
  'permission-denied': 'Permission denied',
  'repository-signature-required': 'A repository signature must be accepted',
  'eula-required': 'A license agreement must be accepted',
  'locked-or-busy': 'The package manager is busy',
  'license-declined': 'License agreement declined',
  'generic': 'Update error'
};

export function classifyDaemonError(code: DaemonErrorCode): UpdateErrorKind {
  switch (code) {
    case 'no-network':
      return 'network-unavailable';
    case 'not-authorized':
      return 'authentication-required';
    case 'permission-denied':
      return 'permission-denied';
    case 'gpg-failure':
    case 'bad-gpg-signature':
    case 'missing-gpg-signature':
      return 'repository-signature-required';
    case 'no-license-agreement':
      return 'eula-required';
    case 'cannot-get-lock':
    case 'lock-required':
      return 'locked-or-busy';
    default:
      return 'generic';
  }
}

export function describeErrorKind(kind: UpdateErrorKind): string {
  return KIND_LABELS[kind];
}

export function createUpdateError(
  kind: UpdateErrorKind,
  operation: UpdateOperation,
  details: string,
  code?: DaemonErrorCode
): UpdateError {
  const label = describeErrorKind(kind);
  const trimmed = details.trim();
  return {
    kind,
    operation,
    code,
    details: trimmed,
    message: trimmed ? `${label}: ${trimmed}` : label
  };
}

export function fromDaemonError(operation: UpdateOperation, code: DaemonErrorCode, details: string): UpdateError {
  return createUpdateError(classifyDaemonError(code), operation, details, code);
}
