import { logger } from './logger';
import { ValidationError } from '../errors';
import { OrderClient } from '../fix/order-client';

/**
 * Log an order client's events. Validation failures are skipped here: the
 * client already logs them and `submitOrder` rejects with the same error.
 */
export function reportClientEvents(client: OrderClient): OrderClient {
  return client
    .on('sent', (order) => {
      logger.info(`SENT ${order.clOrdId}: ${order.readable}`);
    })
    .on('received', (_data, readable) => {
      logger.info(`RECEIVED: ${readable}`);
    })
    .on('info', (text) => {
      logger.info(`INFO: ${text}`);
    })
    .on('error', (error) => {
      if (error instanceof ValidationError) return;
      logger.error(`ERROR: ${error.message}`);
    });
}
