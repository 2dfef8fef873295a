/**
 * Strategic merge patch bodies for workload updates
 *
 * A restart writes the digest annotation and the pod template restart
 * annotation in a single body, so the API server applies both or neither.
 */

import { ALWAYS_PULL_POLICY, LAST_DIGEST_ANNOTATION, RESTART_ANNOTATION } from '../constants';
import { PatchDescriptor } from '../reconcile/types';

export interface WorkloadPatch {
  metadata: {
    annotations: Record<string, string>;
    resourceVersion?: string;
  };
  spec?: {
    template: {
      metadata: {
        annotations: Record<string, string>;
      };
      spec?: {
        containers: Array<{ name: string; imagePullPolicy: string }>;
      };
    };
  };
}

function patchMetadata(annotation: string, resourceVersion?: string): WorkloadPatch['metadata'] {
  return {
    annotations: { [LAST_DIGEST_ANNOTATION]: annotation },
    // The API server answers 409 if the object changed since it was read
    ...(resourceVersion ? { resourceVersion } : {}),
  };
}

export function buildRestartPatch(descriptor: PatchDescriptor, resourceVersion?: string): WorkloadPatch {
  const pullPolicyContainers = descriptor.pullPolicyContainers ?? [];
  return {
    metadata: patchMetadata(descriptor.annotation, resourceVersion),
    spec: {
      template: {
        metadata: {
          annotations: { [RESTART_ANNOTATION]: descriptor.restartTimestamp },
        },
        // Strategic merge: entries merge into the existing containers by name
        ...(pullPolicyContainers.length > 0
          ? {
              spec: {
                containers: pullPolicyContainers.map((name) => ({ name, imagePullPolicy: ALWAYS_PULL_POLICY })),
              },
            }
          : {}),
      },
    },
  };
}

export function buildDigestSyncPatch(annotation: string, resourceVersion?: string): WorkloadPatch {
  return { metadata: patchMetadata(annotation, resourceVersion) };
}
