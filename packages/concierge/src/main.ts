import { config as loadDotenv } from 'dotenv';

import { loadConfig } from './config';
import { createConcierge } from './createConcierge';

loadDotenv();

const config = loadConfig();
const concierge = createConcierge(config);
const { logger } = concierge;

try {
  await concierge.start();
} catch (error) {
  logger.fatal({ err: error }, 'Startup failed');
  await concierge.close();
  process.exit(1);
}

const server = concierge.app.listen(config.port, () => {
  logger.info({ port: config.port }, 'Listening');
});

let shuttingDown = false;
const shutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Shutting down');

  server.close((error) => {
    if (error) {
      logger.warn({ err: error }, 'HTTP server did not close cleanly');
    }
  });
  await concierge.close();
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.fatal({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
  });
}
