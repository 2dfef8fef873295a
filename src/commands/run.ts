import { Server } from 'http';
import { Command } from 'commander';
import { configManager, UpdaterConfig } from '../config';
import { ImageUpdateController } from '../controller/controller';
import { ConfigurationError } from '../errors';
import { createRegistryClient } from '../image/client';
import { createAppsApi, KubeWorkloadClient } from '../k8s/workloads';
import { createLogger } from '../logger';
import { ReconciliationEngine } from '../reconcile/engine';
import { createHealthApp, startHealthServer } from '../server';

const logger = createLogger('run');

interface RunOptions {
  interval?: string;
  namespace?: string;
  forcePullPolicy?: boolean;
  once?: boolean;
}

function loadConfig(options: RunOptions): UpdaterConfig {
  try {
    return configManager.load({
      checkInterval: options.interval === undefined ? undefined : Number(options.interval),
      namespace: options.namespace,
      forcePullPolicy: options.forcePullPolicy,
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal(error.message);
      process.exit(1);
    }
    throw error;
  }
}

export function createController(config: UpdaterConfig): ImageUpdateController {
  const engine = new ReconciliationEngine({
    registry: createRegistryClient(config),
    forcePullPolicy: config.forcePullPolicy,
  });
  return new ImageUpdateController({
    api: new KubeWorkloadClient(createAppsApi()),
    reconciler: engine,
    interval: config.checkInterval,
    namespace: config.namespace,
  });
}

/**
 * Signal handler: closes the health server, waits for the running cycle,
 * then exits 0, or 1 when stopping the controller failed.
 */
export function createShutdown(
  controller: Pick<ImageUpdateController, 'stop'>,
  server?: Pick<Server, 'close'>,
  exit: (code: number) => void = (code) => process.exit(code)
): (signal: NodeJS.Signals) => Promise<void> {
  return async (signal) => {
    logger.info({ signal }, 'Shutting down');
    server?.close();
    try {
      await controller.stop();
      exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Shutdown failed');
      exit(1);
    }
  };
}

const run = new Command('run')
  .description('Watch annotated workloads and restart them when their image digest changes')
  .option('--interval <seconds>', 'Seconds between reconciliation cycles')
  .option('--namespace <namespace>', 'Only watch this namespace')
  .option('--force-pull-policy', 'Set imagePullPolicy to Always on restarted containers')
  .option('--once', 'Run a single cycle and exit')
  .action(async (options: RunOptions) => {
    const config = loadConfig(options);
    const controller = createController(config);

    if (options.once) {
      const summary = await controller.runOnce();
      logger.info(summary, 'Cycle complete');
      return;
    }

    const server =
      config.healthPort > 0
        ? startHealthServer(createHealthApp(() => controller.getLastCycle()), config.healthPort)
        : undefined;

    const shutdown = createShutdown(controller, server);
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    controller.start();
  });

export default run;
