/**
 * Parley node entry point.
 *
 * Runs one device's invitation host: receives invitation traffic from the
 * relay and keeps invitations and conversations under DATA_DIR.
 */

import { getLogger, initLogger } from '@parley/service';
import { loadConfig } from './config';
import { ParleyNode } from './host';

async function main(): Promise<void> {
  const config = loadConfig();

  initLogger(config.logLevel);
  const log = getLogger();

  log.info(
    {
      peerId: config.peerId,
      dataDir: config.dataDir,
      pushApiUrl: config.pushApiUrl,
      relayUrl: config.relayUrl,
    },
    'Parley node starting',
  );

  const node = new ParleyNode(config);

  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Shutdown signal received');
    await node.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err: unknown) => {
      log.fatal({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err: unknown) => {
      log.fatal({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });

  process.on('uncaughtException', (err) => {
    log.fatal({ err }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    log.fatal({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  node.start();

  log.info('Parley node is running');
}

main().catch((err) => {
  console.error('Fatal error during startup:', err);
  process.exit(1);
});
