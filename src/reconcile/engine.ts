/**
 * ReconciliationEngine - decides, per workload snapshot, whether the tracked
 * images moved and what to write back
 */

import { ALWAYS_PULL_POLICY, DIGEST_PATTERN, LAST_DIGEST_ANNOTATION } from '../constants';
import { AnnotationFormatError, ImageParseError, RegistryError } from '../errors';
import { ImageParser, formatReference, imageParser, isPinned } from '../image/parser';
import { ImageReference } from '../image/types';
import { createLogger, Logger } from '../logger';
import {
  StoredDigestState,
  decodeDigestState,
  encodeDigestMap,
  findChangedContainers,
  mergeDigests,
  resolveStoredDigests,
} from './digest-state';
import { isEnabled, policyFromAnnotations, selectContainers } from './selector';
import { ContainerFailure, ContainerInfo, ContainerResult, ReconcileDecision, WorkloadSnapshot } from './types';

/**
 * Anything that turns a reference into its current digest; RegistryClient in production
 */
export interface DigestResolver {
  getDigest(reference: ImageReference): Promise<string>;
}

export interface EngineOptions {
  registry: DigestResolver;
  /** Switch spec.containers to imagePullPolicy Always on restart */
  forcePullPolicy: boolean;
  logger?: Logger;
  now?: () => Date;
  parser?: ImageParser;
}

/**
 * UTC, second precision, `Z` suffix
 */
export function formatRestartTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export class ReconciliationEngine {
  private registry: DigestResolver;
  private forcePullPolicy: boolean;
  private logger: Logger;
  private now: () => Date;
  private parser: ImageParser;

  constructor(options: EngineOptions) {
    this.registry = options.registry;
    this.forcePullPolicy = options.forcePullPolicy;
    this.logger = options.logger ?? createLogger('engine');
    this.now = options.now ?? (() => new Date());
    this.parser = options.parser ?? imageParser;
  }

  async reconcile(snapshot: WorkloadSnapshot): Promise<ReconcileDecision> {
    const log = this.logger.child({ kind: snapshot.kind, namespace: snapshot.namespace, name: snapshot.name });

    if (!isEnabled(snapshot.annotations)) {
      log.debug('Image updates not enabled');
      return { action: 'none', reason: 'disabled', failures: [] };
    }

    const tracked = selectContainers(
      snapshot.containers,
      snapshot.initContainers,
      policyFromAnnotations(snapshot.annotations)
    );
    if (tracked.length === 0) {
      log.debug('No tracked containers');
      return { action: 'none', reason: 'no-tracked-containers', failures: [] };
    }

    // Each container resolves independently; a failure only drops that container
    const results = await Promise.all(tracked.map((container) => this.resolveContainer(container)));
    const failures = collectFailures(results);
    for (const failure of failures) {
      log.warn(
        {
          container: failure.container,
          image: failure.image,
          reason: failure.error instanceof RegistryError ? failure.error.reason : 'parse',
        },
        `Skipping container this cycle: ${failure.error.message}`
      );
    }

    if (failures.length === results.length) {
      log.warn({ failed: failures.map((f) => f.container) }, 'All digest lookups failed, cycle degraded');
      return { action: 'none', reason: 'all-fetches-failed', failures };
    }

    const raw = snapshot.annotations[LAST_DIGEST_ANNOTATION];
    const state = this.decodeState(raw, log);
    if (state.format === 'legacy') {
      log.info({ container: tracked[0].name }, 'Migrating legacy digest annotation');
    }

    const stored = resolveStoredDigests(state, tracked);
    const digests = mergeDigests(stored, tracked, results);
    const annotation = encodeDigestMap(digests);
    const changedContainers = findChangedContainers(stored, results);

    if (changedContainers.length > 0) {
      const pullPolicyContainers = this.pullPolicyContainers(snapshot.containers);
      log.info({ changed: changedContainers }, 'Image digest changed, restarting');
      return {
        action: 'restart',
        patch: {
          digests,
          annotation,
          restartTimestamp: formatRestartTimestamp(this.now()),
          changedContainers,
          ...(pullPolicyContainers.length > 0 ? { pullPolicyContainers } : {}),
        },
        failures,
      };
    }

    // Same digests, but the stored value is not the canonical encoding of them
    if (annotation !== (raw ?? '')) {
      log.info({ annotation }, 'Rewriting digest annotation');
      return { action: 'sync', annotation, digests, failures };
    }

    log.debug('Digests unchanged');
    return { action: 'none', reason: 'unchanged', failures };
  }

  private async resolveContainer(container: ContainerInfo): Promise<ContainerResult> {
    let reference: ImageReference;
    try {
      reference = this.parser.parse(container.image);
    } catch (error) {
      if (error instanceof ImageParseError) {
        return { ok: false, container, error };
      }
      throw error;
    }

    if (isPinned(reference)) {
      return { ok: true, container, digest: reference.digest, source: 'pinned' };
    }

    try {
      const digest = await this.registry.getDigest(reference);
      if (!DIGEST_PATTERN.test(digest)) {
        return {
          ok: false,
          container,
          error: new RegistryError(
            `Malformed digest "${digest}" returned for ${formatReference(reference)}`,
            'malformed',
            reference
          ),
        };
      }
      return { ok: true, container, digest, source: 'registry' };
    } catch (error) {
      if (error instanceof RegistryError) {
        return { ok: false, container, error };
      }
      const message = error instanceof Error ? error.message : String(error);
      return {
        ok: false,
        container,
        error: new RegistryError(`Failed to resolve ${formatReference(reference)}: ${message}`, 'network', reference),
      };
    }
  }

  private decodeState(raw: string | undefined, log: Logger): StoredDigestState {
    try {
      return decodeDigestState(raw);
    } catch (error) {
      if (error instanceof AnnotationFormatError) {
        // Corrupt state is treated as absent, so every tracked digest counts as new
        log.warn({ value: error.value }, 'Ignoring unrecognized digest annotation');
        return { format: 'empty' };
      }
      throw error;
    }
  }

  private pullPolicyContainers(containers: ContainerInfo[]): string[] {
    if (!this.forcePullPolicy) {
      return [];
    }
    return containers.filter((c) => c.imagePullPolicy !== ALWAYS_PULL_POLICY).map((c) => c.name);
  }
}

function collectFailures(results: ContainerResult[]): ContainerFailure[] {
  const failures: ContainerFailure[] = [];
  for (const result of results) {
    if (!result.ok) {
      failures.push({ container: result.container.name, image: result.container.image, error: result.error });
    }
  }
  return failures;
}
