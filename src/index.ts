#!/usr/bin/env node
import { Command } from 'commander';
import run from './commands/run';
import digest from './commands/digest';
import { logger } from './logger';

const program = new Command();

program
  .name('image-updater')
  .description('Restart Kubernetes workloads when the registry digest behind their image tag changes')
  .version('0.1.0');

program.addCommand(run);
program.addCommand(digest);

program.parseAsync().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Command failed');
  process.exit(1);
});
