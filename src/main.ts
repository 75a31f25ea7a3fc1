#!/usr/bin/env node
/**
 * Process entry point: load settings, start the operator, stop on SIGTERM
 * or SIGINT.
 */

import { fileURLToPath } from 'node:url';
import { toError } from './core/errors.js';
import { logger } from './core/logging/index.js';
import { loadOperatorSettings } from './core/settings.js';
import { formatUnitStatus } from './core/status/reporter.js';
import { createOperator } from './operator.js';

const log = logger.child({ component: 'main' });

export async function main(): Promise<void> {
  const settings = loadOperatorSettings();
  const operator = createOperator(settings, undefined, {
    onStatus: (status) => log.debug('Unit status', { status: formatUnitStatus(status) }),
  });

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    log.info('Received signal, shutting down', { signal });
    try {
      await operator.stop();
      process.exit(0);
    } catch (error) {
      log.error('Shutdown failed', toError(error));
      process.exit(1);
    }
  };

  process.once('SIGTERM', (signal) => void shutdown(signal));
  process.once('SIGINT', (signal) => void shutdown(signal));

  await operator.start();
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    log.fatal('Failed to start operator', toError(error));
    process.exit(1);
  });
}
