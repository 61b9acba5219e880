import { PoolClient } from 'pg';
import type {
     AuditRecord,
     DomainEvent,
     NotificationEventType,
     StockAlert,
     StockAlertType,
} from '../types/commerce.types';
import type {
     AuditRepository,
     DomainEventRepository,
     EventRetryPolicy,
     NewStockAlert,
     StockAlertRepository,
} from './types';
import { toInt } from './rows';

interface DomainEventRow {
     id: string | number;
     type: NotificationEventType;
     payload: Record<string, unknown>;
     status: DomainEvent['status'];
     retry_count: number;
     created_at: Date;
}

interface StockAlertRow {
     id: string | number;
     product_id: string | number;
     type: StockAlertType;
     current_quantity: number;
     threshold_quantity: number;
     message: string;
     status: StockAlert['status'];
     created_at: Date;
     resolved_at: Date | null;
}

const ALERT_COLUMNS = `id, product_id, type, current_quantity, threshold_quantity, message, status, created_at, resolved_at`;

function mapAlert(row: StockAlertRow): StockAlert {
     return {
          id: toInt(row.id),
          productId: toInt(row.product_id),
          type: row.type,
          currentQuantity: row.current_quantity,
          thresholdQuantity: row.threshold_quantity,
          message: row.message,
          status: row.status,
          createdAt: row.created_at,
          resolvedAt: row.resolved_at,
     };
}

export class PgAuditRepository implements AuditRepository {
     constructor(private readonly client: PoolClient) {}

     async append(record: AuditRecord): Promise<void> {
          await this.client.query(
               `
      INSERT INTO audit_log (
        actor,
        action,
        entity_type,
        entity_id,
        before,
        after,
        request_origin,
        created_at
      ) VALUES ($1, $2, $3, $4, $5::jsonb, $6::jsonb, $7, $8)
    `,
               [
                    record.actor,
                    record.action,
                    record.entityType,
                    record.entityId,
                    record.before === null ? null : JSON.stringify(record.before),
                    record.after === null ? null : JSON.stringify(record.after),
                    record.requestOrigin,
                    record.createdAt,
               ]
          );
     }
}

export class PgDomainEventRepository implements DomainEventRepository {
     constructor(private readonly client: PoolClient) {}

     async enqueue(type: NotificationEventType, payload: Record<string, unknown>): Promise<number> {
          const { rows } = await this.client.query<{ id: string | number }>(
               `
      INSERT INTO domain_event (type, payload)
      VALUES ($1, $2::jsonb)
      RETURNING id
    `,
               [type, JSON.stringify(payload)]
          );
          return toInt(rows[0].id);
     }

     async claimPending(limit: number, retry: EventRetryPolicy): Promise<DomainEvent[]> {
          const { rows } = await this.client.query<DomainEventRow>(
               `
      SELECT id, type, payload, status, retry_count, created_at
      FROM domain_event
      WHERE status = 'PENDING'
         OR (status = 'FAILED'
             AND retry_count < $2
             AND updated_at <= NOW() - ($3 * INTERVAL '1 millisecond'))
      ORDER BY created_at, id
      LIMIT $1
      FOR UPDATE SKIP LOCKED
    `,
               [limit, retry.maxRetries, retry.backoffMs]
          );
          return rows.map((row) => ({
               id: toInt(row.id),
               type: row.type,
               payload: row.payload,
               status: row.status,
               retryCount: row.retry_count,
               createdAt: row.created_at,
          }));
     }

     async markSent(id: number): Promise<void> {
          await this.client.query(
               `
      UPDATE domain_event
      SET status = 'SENT', updated_at = NOW()
      WHERE id = $1
    `,
               [id]
          );
     }

     async markFailed(id: number, error: string): Promise<void> {
          await this.client.query(
               `
      UPDATE domain_event
      SET status = 'FAILED',
          updated_at = NOW(),
          retry_count = retry_count + 1,
          error = $2
      WHERE id = $1
    `,
               [id, error]
          );
     }
}

export class PgStockAlertRepository implements StockAlertRepository {
     constructor(private readonly client: PoolClient) {}

     async listActive(): Promise<StockAlert[]> {
          const { rows } = await this.client.query<StockAlertRow>(
               `SELECT ${ALERT_COLUMNS} FROM stock_alert WHERE status = 'active' ORDER BY id`
          );
          return rows.map(mapAlert);
     }

     async insert(alert: NewStockAlert): Promise<StockAlert> {
          const { rows } = await this.client.query<StockAlertRow>(
               `
      INSERT INTO stock_alert (product_id, type, current_quantity, threshold_quantity, message)
      VALUES ($1, $2, $3, $4, $5)
      RETURNING ${ALERT_COLUMNS}
    `,
               [alert.productId, alert.type, alert.currentQuantity, alert.thresholdQuantity, alert.message]
          );
          return mapAlert(rows[0]);
     }

     async resolve(id: number, resolvedAt: Date): Promise<void> {
          await this.client.query(
               `
      UPDATE stock_alert
      SET status = 'resolved', resolved_at = $2
      WHERE id = $1
    `,
               [id, resolvedAt]
          );
     }
}
