import {
  ENABLE_ANNOTATION,
  ENABLED_VALUE,
  IGNORE_CONTAINERS_ANNOTATION,
  TRACK_CONTAINERS_ANNOTATION,
  TRACK_INIT_CONTAINERS_ANNOTATION,
} from '../constants';
import { ContainerInfo, TrackingPolicy } from './types';

function parseNameList(value: string | undefined): Set<string> {
  if (!value) {
    return new Set();
  }
  return new Set(
    value
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name !== '')
  );
}

export function isEnabled(annotations: Record<string, string>): boolean {
  return annotations[ENABLE_ANNOTATION] === ENABLED_VALUE;
}

export function policyFromAnnotations(annotations: Record<string, string>): TrackingPolicy {
  return {
    include: parseNameList(annotations[TRACK_CONTAINERS_ANNOTATION]),
    exclude: parseNameList(annotations[IGNORE_CONTAINERS_ANNOTATION]),
    trackInit: annotations[TRACK_INIT_CONTAINERS_ANNOTATION] === 'true',
  };
}

/**
 * Resolve the tracked containers. include wins over exclude, and neither
 * applies to init containers.
 */
export function selectContainers(
  containers: ContainerInfo[],
  initContainers: ContainerInfo[],
  policy: TrackingPolicy
): ContainerInfo[] {
  let tracked: ContainerInfo[];
  if (policy.include.size > 0) {
    tracked = containers.filter((c) => policy.include.has(c.name));
  } else if (policy.exclude.size > 0) {
    tracked = containers.filter((c) => !policy.exclude.has(c.name));
  } else {
    tracked = [...containers];
  }

  if (policy.trackInit) {
    tracked.push(...initContainers);
  }
  return tracked;
}
