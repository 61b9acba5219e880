import dotenv from 'dotenv';
import { closePool } from '@backoffice/shared/src/db/client';
import { withUnitOfWork } from '@backoffice/shared/src/db/unit-of-work';
import {
     createCommerceServices,
     reservationOptionsFromEnv,
} from '@backoffice/shared/src/services/container';
import type { RequestContext } from '@backoffice/shared/src/types/commerce.types';
import { createChildLogger } from '@backoffice/shared/src/utils/logger';

dotenv.config();

const logger = createChildLogger({ worker: 'reservation-expiry' });

const SWEEP_INTERVAL_MS = parseInt(process.env.RESERVATION_SWEEP_INTERVAL_MS || '60000', 10);
const SWEEP_BATCH_SIZE = parseInt(process.env.RESERVATION_SWEEP_BATCH_SIZE || '100', 10);

const WORKER_CONTEXT: RequestContext = {
     actor: 'system:reservation-expiry',
     origin: 'reservation-expiry-worker',
};

class ReservationExpiryWorker {
     private running = false;
     private readonly services = createCommerceServices(reservationOptionsFromEnv());

     async start() {
          this.running = true;
          logger.info(
               { intervalMs: SWEEP_INTERVAL_MS, batchSize: SWEEP_BATCH_SIZE },
               'Starting reservation expiry worker'
          );

          while (this.running) {
               let examined = 0;
               try {
                    ({ examined } = await this.services.expiry.sweep(
                         withUnitOfWork,
                         WORKER_CONTEXT,
                         new Date(),
                         SWEEP_BATCH_SIZE
                    ));
               } catch (error) {
                    logger.error({ error }, 'Reservation sweep failed');
               }

               if (examined < SWEEP_BATCH_SIZE) {
                    await this.sleep(SWEEP_INTERVAL_MS);
               }
          }
     }

     stop() {
          logger.info('Stopping reservation expiry worker');
          this.running = false;
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => setTimeout(resolve, ms));
     }
}

async function main() {
     if (reservationOptionsFromEnv().reservationTtlMinutes === 0) {
          logger.warn('RESERVATION_TTL_MINUTES is 0, new reservations never expire; sweeping existing leases only');
     }

     const worker = new ReservationExpiryWorker();

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          worker.stop();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     await worker.start();
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error in reservation expiry worker');
     process.exit(1);
});
