import type { UnitOfWorkRunner } from '../db/unit-of-work';
import type { EventRetryPolicy } from '../repositories/types';
import type { DomainEvent } from '../types/commerce.types';
import { logger } from '../utils/logger';

export type EventPublisher = (event: DomainEvent) => Promise<void>;

export interface DispatchResult {
     sent: number;
     failed: number;
}

export const DEFAULT_RETRY_POLICY: EventRetryPolicy = { maxRetries: 5, backoffMs: 30000 };

/**
 * Drains pending outbox rows in batches. Each batch runs in one transaction that
 * holds the claimed rows, so concurrent dispatchers never publish the same event.
 * A failed publish leaves the event FAILED; it is claimed again once the backoff
 * has passed, until it has failed `maxRetries` times.
 */
export class OutboxDispatcher {
     constructor(
          private readonly runUnitOfWork: UnitOfWorkRunner,
          private readonly publish: EventPublisher,
          private readonly batchSize: number = 100,
          private readonly retry: EventRetryPolicy = DEFAULT_RETRY_POLICY
     ) {}

     async dispatchBatch(): Promise<DispatchResult> {
          return this.runUnitOfWork(async (uow) => {
               const events = await uow.events.claimPending(this.batchSize, this.retry);
               if (events.length === 0) {
                    return { sent: 0, failed: 0 };
               }

               logger.debug({ eventCount: events.length }, 'Processing event batch');

               let sent = 0;
               let failed = 0;
               for (const event of events) {
                    try {
                         await this.publish(event);
                         await uow.events.markSent(event.id);
                         sent += 1;
                         logger.debug({ eventId: event.id, type: event.type }, 'Event dispatched');
                    } catch (error) {
                         failed += 1;
                         const attempts = event.retryCount + 1;
                         if (attempts >= this.retry.maxRetries) {
                              logger.error(
                                   { error, eventId: event.id, type: event.type, attempts },
                                   'Event failed its last publish attempt'
                              );
                         } else {
                              logger.warn(
                                   { error, eventId: event.id, type: event.type, attempts },
                                   'Failed to dispatch event, will retry'
                              );
                         }
                         await uow.events.markFailed(
                              event.id,
                              error instanceof Error ? error.message : 'Unknown error'
                         );
                    }
               }

               logger.info({ sent, failed }, 'Event batch processed');
               return { sent, failed };
          });
     }
}
