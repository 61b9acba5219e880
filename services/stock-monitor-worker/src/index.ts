import dotenv from 'dotenv';
import { closePool } from '@backoffice/shared/src/db/client';
import { withUnitOfWork } from '@backoffice/shared/src/db/unit-of-work';
import { StockAlertService } from '@backoffice/shared/src/services/stock-alert-service';
import type { RequestContext } from '@backoffice/shared/src/types/commerce.types';
import { createChildLogger } from '@backoffice/shared/src/utils/logger';

dotenv.config();

const logger = createChildLogger({ worker: 'stock-monitor' });

const CHECK_INTERVAL_MS = parseInt(process.env.STOCK_CHECK_INTERVAL_MS || '300000', 10);

const WORKER_CONTEXT: RequestContext = {
     actor: 'system:stock-monitor',
     origin: 'stock-monitor-worker',
};

class StockMonitorWorker {
     private running = false;
     private readonly alerts = new StockAlertService();

     constructor(private readonly dryRun: boolean) {}

     async checkOnce() {
          return withUnitOfWork((uow) => this.alerts.checkStockLevels(uow, WORKER_CONTEXT, { dryRun: this.dryRun }));
     }

     async start() {
          this.running = true;
          logger.info({ intervalMs: CHECK_INTERVAL_MS, dryRun: this.dryRun }, 'Starting stock monitor');

          while (this.running) {
               try {
                    await this.checkOnce();
               } catch (error) {
                    logger.error({ error }, 'Stock level check failed');
               }
               await this.sleep(CHECK_INTERVAL_MS);
          }
     }

     stop() {
          logger.info('Stopping stock monitor');
          this.running = false;
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => setTimeout(resolve, ms));
     }
}

async function main() {
     const args = process.argv.slice(2);
     const worker = new StockMonitorWorker(args.includes('--dry-run'));

     // One-shot mode for cron
     if (args.includes('--once')) {
          const summary = await worker.checkOnce();
          logger.info({ ...summary, raised: summary.raised.length }, 'Stock level check finished');
          await closePool();
          return;
     }

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
     logger.fatal({ err }, 'Fatal error in stock monitor');
     process.exit(1);
});
