/**
 * Start a query server configured from the environment.
 */

import { ConfigError, loadServerConfig } from './config';
import { QueryServer } from './QueryServer';

async function main(): Promise<void> {
  const server = new QueryServer(loadServerConfig(process.env));
  await server.start();

  const shutdown = (): void => {
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[QueryServer] Error during shutdown:', err);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error(err instanceof ConfigError ? err.message : err);
  process.exit(1);
});
