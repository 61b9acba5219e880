import dotenv from 'dotenv';
import { closePool } from '@backoffice/shared/src/db/client';
import { withUnitOfWork } from '@backoffice/shared/src/db/unit-of-work';
import { closeConnection, publishDomainEvent } from '@backoffice/shared/src/messaging/client';
import { OutboxDispatcher } from '@backoffice/shared/src/services/outbox-dispatcher';
import { createChildLogger } from '@backoffice/shared/src/utils/logger';

dotenv.config();

const logger = createChildLogger({ worker: 'event-dispatcher' });

const BATCH_SIZE = parseInt(process.env.EVENT_BATCH_SIZE || '100', 10);
const POLL_INTERVAL_MS = parseInt(process.env.EVENT_POLL_INTERVAL_MS || '200', 10);
const RETRY_POLICY = {
     maxRetries: parseInt(process.env.EVENT_MAX_RETRIES || '5', 10),
     backoffMs: parseInt(process.env.EVENT_RETRY_BACKOFF_MS || '30000', 10),
};

class EventDispatcher {
     private running = false;
     private readonly outbox = new OutboxDispatcher(
          withUnitOfWork,
          publishDomainEvent,
          BATCH_SIZE,
          RETRY_POLICY
     );

     async start() {
          this.running = true;
          logger.info(
               { batchSize: BATCH_SIZE, pollIntervalMs: POLL_INTERVAL_MS, ...RETRY_POLICY },
               'Starting event dispatcher'
          );

          while (this.running) {
               let sent = 0;
               try {
                    ({ sent } = await this.outbox.dispatchBatch());
               } catch (error) {
                    logger.error({ error }, 'Error processing event batch');
               }

               // A full batch means more are waiting
               if (sent < BATCH_SIZE) {
                    await this.sleep(POLL_INTERVAL_MS);
               }
          }
     }

     stop() {
          logger.info('Stopping event dispatcher');
          this.running = false;
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => setTimeout(resolve, ms));
     }
}

async function main() {
     const dispatcher = new EventDispatcher();

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          dispatcher.stop();
          await new Promise((resolve) => setTimeout(resolve, 1000));
          await closeConnection();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     await dispatcher.start();
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error in event dispatcher');
     process.exit(1);
});
