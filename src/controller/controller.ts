/**
 * ImageUpdateController - periodic reconciliation of every watched workload
 */

import { PatchConflictError } from '../errors';
import { buildDigestSyncPatch, buildRestartPatch, WorkloadPatch } from '../k8s/patch';
import { toWorkloadSnapshot, workloadKey, WorkloadObject } from '../k8s/snapshot';
import { WORKLOAD_KINDS, WorkloadApi } from '../k8s/workloads';
import { createLogger, Logger } from '../logger';
import { ReconcileDecision, WorkloadKind, WorkloadSnapshot } from '../reconcile/types';

export interface Reconciler {
  reconcile(snapshot: WorkloadSnapshot): Promise<ReconcileDecision>;
}

export interface ControllerOptions {
  api: WorkloadApi;
  reconciler: Reconciler;
  /** Seconds between cycles */
  interval: number;
  /** Empty or unset watches every namespace */
  namespace?: string;
  logger?: Logger;
}

export interface CycleSummary {
  workloads: number;
  restarted: number;
  synced: number;
  unchanged: number;
  /** Not enabled, nothing tracked, or still being reconciled by an earlier cycle */
  skipped: number;
  failed: number;
  completedAt: string;
}

interface WorkloadHandler {
  list(namespace?: string): Promise<WorkloadObject[]>;
  patch(namespace: string, name: string, body: WorkloadPatch): Promise<void>;
}

type Outcome = 'restarted' | 'synced' | 'unchanged' | 'skipped' | 'failed';

export class ImageUpdateController {
  private handlers: Record<WorkloadKind, WorkloadHandler>;
  private reconciler: Reconciler;
  private intervalMs: number;
  private namespace?: string;
  private logger: Logger;

  private inFlight = new Set<string>();
  private cycles = new Set<Promise<void>>();
  private timer?: NodeJS.Timeout;
  private lastCycle?: CycleSummary;

  constructor(options: ControllerOptions) {
    const api = options.api;
    const handlerFor = (kind: WorkloadKind): WorkloadHandler => ({
      list: (namespace) => api.list(kind, namespace),
      patch: (namespace, name, body) => api.patch(kind, namespace, name, body),
    });
    this.handlers = {
      Deployment: handlerFor('Deployment'),
      StatefulSet: handlerFor('StatefulSet'),
      DaemonSet: handlerFor('DaemonSet'),
    };
    this.reconciler = options.reconciler;
    this.intervalMs = options.interval * 1000;
    this.namespace = options.namespace || undefined;
    this.logger = options.logger ?? createLogger('controller');
  }

  getLastCycle(): CycleSummary | undefined {
    return this.lastCycle;
  }

  /**
   * Run one reconciliation pass over every workload kind
   */
  async runOnce(): Promise<CycleSummary> {
    const counts: Record<Outcome, number> = { restarted: 0, synced: 0, unchanged: 0, skipped: 0, failed: 0 };
    let workloads = 0;

    for (const kind of WORKLOAD_KINDS) {
      const handler = this.handlers[kind];
      let objects: WorkloadObject[];
      try {
        objects = await handler.list(this.namespace);
      } catch (error) {
        this.logger.error({ kind, err: error }, `Failed to list ${kind} workloads`);
        continue;
      }

      const snapshots: WorkloadSnapshot[] = [];
      for (const object of objects) {
        const snapshot = toWorkloadSnapshot(kind, object);
        if (snapshot) {
          snapshots.push(snapshot);
        }
      }
      workloads += snapshots.length;

      const outcomes = await Promise.all(snapshots.map((snapshot) => this.reconcileWorkload(snapshot, handler)));
      for (const outcome of outcomes) {
        counts[outcome] += 1;
      }
    }

    const summary: CycleSummary = { workloads, ...counts, completedAt: new Date().toISOString() };
    this.lastCycle = summary;
    return summary;
  }

  /**
   * Run a cycle now and then every interval until stop()
   */
  start(): void {
    if (this.timer) {
      return;
    }
    this.logger.info({ interval: this.intervalMs / 1000, namespace: this.namespace ?? '*' }, 'image-updater started');
    this.tick();
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  /**
   * Stop scheduling and wait for cycles already running
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await Promise.all(this.cycles);
    this.logger.info('image-updater stopped');
  }

  private tick(): void {
    const cycle: Promise<void> = this.runOnce()
      .then(
        (summary) => {
          this.logger.info(summary, 'Cycle complete');
        },
        (error: unknown) => {
          this.logger.error({ err: error }, 'Cycle failed');
        }
      )
      .finally(() => {
        this.cycles.delete(cycle);
      });
    this.cycles.add(cycle);
  }

  private async reconcileWorkload(snapshot: WorkloadSnapshot, handler: WorkloadHandler): Promise<Outcome> {
    const key = workloadKey(snapshot);
    const log = this.logger.child({ kind: snapshot.kind, namespace: snapshot.namespace, name: snapshot.name });

    if (this.inFlight.has(key)) {
      log.debug('Previous reconciliation still running, skipping');
      return 'skipped';
    }

    this.inFlight.add(key);
    try {
      const decision = await this.reconciler.reconcile(snapshot);
      return await this.apply(snapshot, decision, handler, log);
    } catch (error) {
      if (error instanceof PatchConflictError) {
        log.warn('Workload changed since it was read, retrying next cycle');
      } else {
        log.error({ err: error }, 'Reconciliation failed');
      }
      return 'failed';
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async apply(
    snapshot: WorkloadSnapshot,
    decision: ReconcileDecision,
    handler: WorkloadHandler,
    log: Logger
  ): Promise<Outcome> {
    switch (decision.action) {
      case 'restart':
        await handler.patch(
          snapshot.namespace,
          snapshot.name,
          buildRestartPatch(decision.patch, snapshot.resourceVersion)
        );
        log.info(
          { changed: decision.patch.changedContainers, restartedAt: decision.patch.restartTimestamp },
          `Restarted ${snapshot.kind}`
        );
        return 'restarted';
      case 'sync':
        await handler.patch(snapshot.namespace, snapshot.name, buildDigestSyncPatch(decision.annotation, snapshot.resourceVersion));
        return 'synced';
      case 'none':
        switch (decision.reason) {
          case 'unchanged':
            return 'unchanged';
          case 'all-fetches-failed':
            return 'failed';
          case 'disabled':
          case 'no-tracked-containers':
            return 'skipped';
        }
    }
  }
}
