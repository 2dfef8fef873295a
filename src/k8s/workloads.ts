/**
 * Workload access over the apps/v1 API
 */

import { AppsV1Api, KubeConfig } from '@kubernetes/client-node';
import { PatchConflictError } from '../errors';
import { WorkloadKind } from '../reconcile/types';
import { WorkloadPatch } from './patch';
import { WorkloadObject } from './snapshot';

export const WORKLOAD_KINDS: readonly WorkloadKind[] = ['Deployment', 'StatefulSet', 'DaemonSet'];

const STRATEGIC_MERGE_PATCH = 'application/strategic-merge-patch+json';
const FIELD_MANAGER = 'image-updater';

/**
 * What the controller needs from the Kubernetes API
 */
export interface WorkloadApi {
  list(kind: WorkloadKind, namespace?: string): Promise<WorkloadObject[]>;
  /** @throws PatchConflictError when the object changed since it was read */
  patch(kind: WorkloadKind, namespace: string, name: string, body: WorkloadPatch): Promise<void>;
}

export type AppsApi = Pick<
  AppsV1Api,
  | 'listDeploymentForAllNamespaces'
  | 'listNamespacedDeployment'
  | 'patchNamespacedDeployment'
  | 'listStatefulSetForAllNamespaces'
  | 'listNamespacedStatefulSet'
  | 'patchNamespacedStatefulSet'
  | 'listDaemonSetForAllNamespaces'
  | 'listNamespacedDaemonSet'
  | 'patchNamespacedDaemonSet'
>;

// HttpError from the client carries the status as statusCode
function isConflict(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'statusCode' in error && error.statusCode === 409;
}

export class KubeWorkloadClient implements WorkloadApi {
  constructor(private apps: AppsApi) {}

  async list(kind: WorkloadKind, namespace?: string): Promise<WorkloadObject[]> {
    switch (kind) {
      case 'Deployment': {
        const { body } = namespace
          ? await this.apps.listNamespacedDeployment(namespace)
          : await this.apps.listDeploymentForAllNamespaces();
        return body.items;
      }
      case 'StatefulSet': {
        const { body } = namespace
          ? await this.apps.listNamespacedStatefulSet(namespace)
          : await this.apps.listStatefulSetForAllNamespaces();
        return body.items;
      }
      case 'DaemonSet': {
        const { body } = namespace
          ? await this.apps.listNamespacedDaemonSet(namespace)
          : await this.apps.listDaemonSetForAllNamespaces();
        return body.items;
      }
    }
  }

  async patch(kind: WorkloadKind, namespace: string, name: string, body: WorkloadPatch): Promise<void> {
    const options = { headers: { 'Content-Type': STRATEGIC_MERGE_PATCH } };
    try {
      switch (kind) {
        case 'Deployment':
          await this.apps.patchNamespacedDeployment(
            name, namespace, body, undefined, undefined, FIELD_MANAGER, undefined, undefined, options
          );
          return;
        case 'StatefulSet':
          await this.apps.patchNamespacedStatefulSet(
            name, namespace, body, undefined, undefined, FIELD_MANAGER, undefined, undefined, options
          );
          return;
        case 'DaemonSet':
          await this.apps.patchNamespacedDaemonSet(
            name, namespace, body, undefined, undefined, FIELD_MANAGER, undefined, undefined, options
          );
          return;
      }
    } catch (error) {
      if (isConflict(error)) {
        throw new PatchConflictError(`${kind}/${namespace}/${name}`);
      }
      throw error;
    }
  }
}

/**
 * In-cluster service account when running in a pod, kubeconfig otherwise
 */
export function createAppsApi(): AppsV1Api {
  const kc = new KubeConfig();
  kc.loadFromDefault();
  return kc.makeApiClient(AppsV1Api);
}
