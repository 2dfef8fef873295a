import { V1Container, V1ObjectMeta, V1PodTemplateSpec } from '@kubernetes/client-node';
import { ContainerInfo, WorkloadKind, WorkloadSnapshot } from '../reconcile/types';

/**
 * The part of a Deployment, StatefulSet or DaemonSet the controller reads
 */
export interface WorkloadObject {
  metadata?: V1ObjectMeta;
  spec?: {
    template: V1PodTemplateSpec;
  };
}

function toContainerInfo(containers: V1Container[] | undefined, isInit: boolean): ContainerInfo[] {
  const result: ContainerInfo[] = [];
  for (const c of containers ?? []) {
    // Entries without a name or image cannot be tracked
    if (!c.name || !c.image) {
      continue;
    }
    result.push({ name: c.name, image: c.image, isInit, imagePullPolicy: c.imagePullPolicy });
  }
  return result;
}

export function toWorkloadSnapshot(kind: WorkloadKind, object: WorkloadObject): WorkloadSnapshot | null {
  const name = object.metadata?.name;
  if (!name) {
    return null;
  }

  const podSpec = object.spec?.template.spec;
  return {
    kind,
    namespace: object.metadata?.namespace || 'default',
    name,
    resourceVersion: object.metadata?.resourceVersion,
    annotations: { ...(object.metadata?.annotations ?? {}) },
    containers: toContainerInfo(podSpec?.containers, false),
    initContainers: toContainerInfo(podSpec?.initContainers, true),
  };
}

export function workloadKey(workload: { kind: WorkloadKind; namespace: string; name: string }): string {
  return `${workload.kind}/${workload.namespace}/${workload.name}`;
}
