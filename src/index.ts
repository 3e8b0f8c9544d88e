import 'dotenv/config';
import { logger } from './utils/logger';
import { loadConfig } from './utils/load-config';
import { createOrderClient } from './fix/order-client';
import { reportClientEvents } from './utils/report-events';

/**
 * Submit one order described by the environment and exit with 0 when it was
 * delivered (with or without a response), 1 otherwise
 */
async function main(): Promise<number> {
  logger.info('fix-order-entry starting...');
  logger.info(`Node.js version: ${process.version}`);

  const config = loadConfig();
  const client = createOrderClient(config.client);

  reportClientEvents(client);

  const submission = await client.submitOrder(config.order);
  const failed = submission.outcome.kind === 'refused' || submission.outcome.kind === 'transportError';
  return failed ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error(`Application error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
