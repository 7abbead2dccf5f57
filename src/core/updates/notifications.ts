import type { RepoSignature, RestartKind } from '../daemon/types.js';
import type { EulaRequest } from './eula-negotiator.js';
import type { SnapshotField, UpdatesSnapshot } from './snapshot.js';
import type { UpdateError, UpdateOperation } from './update-errors.js';

/**
 * Everything the coordinator tells its subscribers. The current snapshot is
 * always published before any notification is delivered, so a listener
 * reading `coordinator.snapshot` sees the state the notification describes.
 */
export type UpdatesNotification =
  /** Catalog or check outcome changed */
  | { type: 'updates-changed'; snapshot: UpdatesSnapshot }
  /** Exactly once per check or install attempt */
  | { type: 'done'; operation: Exclude<UpdateOperation, 'detail'>; success: boolean }
  | { type: 'updates-installed'; packageIds: string[] }
  | { type: 'update-detail'; packageId: string; updateText: string; urls: string[]; restart: RestartKind; changelog?: string }
  | { type: 'eula-required'; request: Readonly<EulaRequest> }
  | { type: 'repo-signature-required'; signature: RepoSignature }
  | { type: 'restart-required'; restart: 'session' | 'system'; packageId: string }
  /** The number of available updates changed to a non-zero value after a check */
  | { type: 'new-updates'; count: number; securityCount: number; importantCount: number }
  /** Detail failures name the package the request was for */
  | { type: 'error'; error: UpdateError; packageId?: string }
  | { type: 'network-state-changed'; online: boolean; mobile: boolean }
  | { type: 'battery-state-changed'; onBattery: boolean }
  | { type: 'property-changed'; field: SnapshotField; snapshot: UpdatesSnapshot };

export type UpdatesNotificationType = UpdatesNotification['type'];

export type UpdatesListener = (notification: UpdatesNotification) => void;
