/**
 * Codec for the last-digest annotation.
 *
 * Canonical form is `name:digest` pairs joined by `,` and sorted by name.
 * The legacy form is a single bare digest, written before per-container
 * tracking existed; it belongs to the first tracked container and is
 * rewritten canonically on the next write.
 */

import { DIGEST_PATTERN } from '../constants';
import { AnnotationFormatError } from '../errors';
import { ContainerInfo, ContainerResult, DigestMap } from './types';

const ENTRY_SEPARATOR = ',';
const PAIR_SEPARATOR = ':';
const LEGACY_DIGEST_PATTERN = /^sha(?:256|384|512):[a-zA-Z0-9]+$/;

export type StoredDigestState =
  | { format: 'empty' }
  | { format: 'canonical'; digests: DigestMap }
  | { format: 'legacy'; digest: string };

function parseCanonical(value: string): DigestMap | null {
  const digests: DigestMap = new Map();
  const entries = value
    .split(ENTRY_SEPARATOR)
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');

  for (const entry of entries) {
    const separator = entry.indexOf(PAIR_SEPARATOR);
    if (separator <= 0) {
      return null;
    }
    const name = entry.substring(0, separator).trim();
    const digest = entry.substring(separator + 1).trim();
    if (name === '' || !DIGEST_PATTERN.test(digest)) {
      return null;
    }
    digests.set(name, digest);
  }
  return digests.size > 0 ? digests : null;
}

/**
 * @throws AnnotationFormatError when the value is neither canonical nor legacy
 */
export function decodeDigestState(raw: string | undefined): StoredDigestState {
  const value = raw?.trim() ?? '';
  if (value === '') {
    return { format: 'empty' };
  }

  const digests = parseCanonical(value);
  if (digests) {
    return { format: 'canonical', digests };
  }

  if (LEGACY_DIGEST_PATTERN.test(value)) {
    return { format: 'legacy', digest: value };
  }

  throw new AnnotationFormatError(value, 'expected "name:digest[,name:digest...]" or a bare digest');
}

export function encodeDigestMap(digests: DigestMap): string {
  return [...digests.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, digest]) => `${name}${PAIR_SEPARATOR}${digest}`)
    .join(ENTRY_SEPARATOR);
}

/**
 * Stored digests keyed by container name, assigning a legacy digest to the
 * first tracked container
 */
export function resolveStoredDigests(state: StoredDigestState, tracked: ContainerInfo[]): DigestMap {
  switch (state.format) {
    case 'empty':
      return new Map();
    case 'canonical':
      return new Map(state.digests);
    case 'legacy':
      return tracked.length > 0 ? new Map([[tracked[0].name, state.digest]]) : new Map();
  }
}

/**
 * Next persisted map: fresh digests for resolved containers, stored ones
 * carried forward for failed containers, untracked entries dropped
 */
export function mergeDigests(stored: DigestMap, tracked: ContainerInfo[], results: ContainerResult[]): DigestMap {
  const resolved = new Map<string, string>();
  for (const result of results) {
    if (result.ok) {
      resolved.set(result.container.name, result.digest);
    }
  }

  const next: DigestMap = new Map();
  for (const container of tracked) {
    const digest = resolved.get(container.name) ?? stored.get(container.name);
    if (digest !== undefined) {
      next.set(container.name, digest);
    }
  }
  return next;
}

/**
 * Containers whose registry digest is absent from, or differs from, the stored map.
 * Pinned digests never count as a change.
 */
export function findChangedContainers(stored: DigestMap, results: ContainerResult[]): string[] {
  const changed: string[] = [];
  for (const result of results) {
    if (result.ok && result.source === 'registry' && stored.get(result.container.name) !== result.digest) {
      changed.push(result.container.name);
    }
  }
  return changed;
}
