/**
 * querygate server - main entry point
 */

import { config } from './config.js';
import { startServer } from './server.js';
import { logger } from './utils/logger.js';

startServer(config).catch((error: unknown) => {
  logger.error(`Failed to start server: ${error}`);
  process.exit(1);
});
