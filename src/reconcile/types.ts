/**
 * Types for the reconciliation decision engine
 */

import { ImageParseError, RegistryError } from '../errors';

export type WorkloadKind = 'Deployment' | 'StatefulSet' | 'DaemonSet';

export interface WorkloadIdentity {
  kind: WorkloadKind;
  namespace: string;
  name: string;
}

export interface ContainerInfo {
  name: string;
  image: string;
  isInit: boolean;
  imagePullPolicy?: string;
}

export interface TrackingPolicy {
  include: Set<string>;
  exclude: Set<string>;
  trackInit: boolean;
}

/**
 * Container name to digest. Insertion order carries no meaning, the
 * encoded form is always sorted by name.
 */
export type DigestMap = Map<string, string>;

/**
 * Rebuilt from the live object every cycle, never cached
 */
export interface WorkloadSnapshot extends WorkloadIdentity {
  resourceVersion?: string;
  annotations: Record<string, string>;
  containers: ContainerInfo[];
  initContainers: ContainerInfo[];
}

export type DigestSource = 'registry' | 'pinned';

export type ContainerResult =
  | { ok: true; container: ContainerInfo; digest: string; source: DigestSource }
  | { ok: false; container: ContainerInfo; error: ImageParseError | RegistryError };

export interface ContainerFailure {
  container: string;
  image: string;
  error: ImageParseError | RegistryError;
}

export interface PatchDescriptor {
  digests: DigestMap;
  /** Canonical encoding of `digests`, the new last-digest value */
  annotation: string;
  restartTimestamp: string;
  changedContainers: string[];
  /** spec.containers to switch to imagePullPolicy Always */
  pullPolicyContainers?: string[];
}

export type NoActionReason = 'disabled' | 'no-tracked-containers' | 'all-fetches-failed' | 'unchanged';

export type ReconcileDecision =
  | { action: 'none'; reason: NoActionReason; failures: ContainerFailure[] }
  | { action: 'sync'; annotation: string; digests: DigestMap; failures: ContainerFailure[] }
  | { action: 'restart'; patch: PatchDescriptor; failures: ContainerFailure[] };
