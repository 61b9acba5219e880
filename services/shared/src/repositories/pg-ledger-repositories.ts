import { PoolClient } from 'pg';
import type {
     MovementFilter,
     MovementTag,
     MovementType,
     Reservation,
     ReservationStatus,
     StockMovement,
} from '../types/commerce.types';
import type {
     MovementRepository,
     NewMovement,
     NewReservation,
     ReservationRepository,
} from './types';
import { toInt } from './rows';

interface MovementRow {
     id: string | number;
     product_id: string | number;
     type: MovementType;
     tag: MovementTag;
     quantity: number;
     quantity_before: number;
     quantity_after: number;
     reason: string;
     actor: string;
     reference_id: string | null;
     created_at: Date;
}

interface ReservationRow {
     id: string | number;
     product_id: string | number;
     order_ref: string;
     quantity: number;
     status: ReservationStatus;
     created_at: Date;
     expires_at: Date | null;
}

const MOVEMENT_COLUMNS = `id, product_id, type, tag, quantity, quantity_before, quantity_after, reason, actor, reference_id, created_at`;
const RESERVATION_COLUMNS = `id, product_id, order_ref, quantity, status, created_at, expires_at`;

export const DEFAULT_MOVEMENT_PAGE_SIZE = 100;

function mapMovement(row: MovementRow): StockMovement {
     return {
          id: toInt(row.id),
          productId: toInt(row.product_id),
          type: row.type,
          tag: row.tag,
          quantity: row.quantity,
          quantityBefore: row.quantity_before,
          quantityAfter: row.quantity_after,
          reason: row.reason,
          actor: row.actor,
          referenceId: row.reference_id,
          createdAt: row.created_at,
     };
}

function mapReservation(row: ReservationRow): Reservation {
     return {
          id: toInt(row.id),
          productId: toInt(row.product_id),
          orderRef: row.order_ref,
          quantity: row.quantity,
          status: row.status,
          createdAt: row.created_at,
          expiresAt: row.expires_at,
     };
}

export class PgMovementRepository implements MovementRepository {
     constructor(private readonly client: PoolClient) {}

     async append(movement: NewMovement): Promise<StockMovement> {
          const { rows } = await this.client.query<MovementRow>(
               `
      INSERT INTO stock_movement (
        product_id,
        type,
        tag,
        quantity,
        quantity_before,
        quantity_after,
        reason,
        actor,
        reference_id
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      RETURNING ${MOVEMENT_COLUMNS}
    `,
               [
                    movement.productId,
                    movement.type,
                    movement.tag,
                    movement.quantity,
                    movement.quantityBefore,
                    movement.quantityAfter,
                    movement.reason,
                    movement.actor,
                    movement.referenceId,
               ]
          );
          return mapMovement(rows[0]);
     }

     async query(filter: MovementFilter): Promise<StockMovement[]> {
          const conditions: string[] = [];
          const params: unknown[] = [];

          if (filter.productId !== undefined) {
               params.push(filter.productId);
               conditions.push(`product_id = $${params.length}`);
          }
          if (filter.actor !== undefined) {
               params.push(filter.actor);
               conditions.push(`actor = $${params.length}`);
          }
          if (filter.from !== undefined) {
               params.push(filter.from);
               conditions.push(`created_at >= $${params.length}`);
          }
          if (filter.to !== undefined) {
               params.push(filter.to);
               conditions.push(`created_at < $${params.length}`);
          }

          params.push(filter.limit ?? DEFAULT_MOVEMENT_PAGE_SIZE);
          const limitParam = params.length;
          params.push(filter.offset ?? 0);
          const offsetParam = params.length;

          const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

          const { rows } = await this.client.query<MovementRow>(
               `
      SELECT ${MOVEMENT_COLUMNS}
      FROM stock_movement
      ${where}
      ORDER BY created_at DESC, id DESC
      LIMIT $${limitParam} OFFSET $${offsetParam}
    `,
               params
          );
          return rows.map(mapMovement);
     }

     async listByProduct(productId: number): Promise<StockMovement[]> {
          const { rows } = await this.client.query<MovementRow>(
               `SELECT ${MOVEMENT_COLUMNS} FROM stock_movement WHERE product_id = $1 ORDER BY id`,
               [productId]
          );
          return rows.map(mapMovement);
     }
}

export class PgReservationRepository implements ReservationRepository {
     constructor(private readonly client: PoolClient) {}

     async insert(reservation: NewReservation): Promise<Reservation> {
          const { rows } = await this.client.query<ReservationRow>(
               `
      INSERT INTO reservation (product_id, order_ref, quantity, status, expires_at)
      VALUES ($1, $2, $3, 'ACTIVE', $4)
      RETURNING ${RESERVATION_COLUMNS}
    `,
               [reservation.productId, reservation.orderRef, reservation.quantity, reservation.expiresAt]
          );
          return mapReservation(rows[0]);
     }

     async findById(id: number): Promise<Reservation | null> {
          const { rows } = await this.client.query<ReservationRow>(
               `SELECT ${RESERVATION_COLUMNS} FROM reservation WHERE id = $1`,
               [id]
          );
          return rows.length > 0 ? mapReservation(rows[0]) : null;
     }

     async findByIdForUpdate(id: number): Promise<Reservation | null> {
          const { rows } = await this.client.query<ReservationRow>(
               `SELECT ${RESERVATION_COLUMNS} FROM reservation WHERE id = $1 FOR UPDATE`,
               [id]
          );
          return rows.length > 0 ? mapReservation(rows[0]) : null;
     }

     async listByIdsForUpdate(ids: number[]): Promise<Reservation[]> {
          if (ids.length === 0) {
               return [];
          }
          const { rows } = await this.client.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM reservation
      WHERE id = ANY($1::bigint[])
      ORDER BY product_id, id
      FOR UPDATE
    `,
               [ids]
          );
          return rows.map(mapReservation);
     }

     async updateStatus(id: number, status: ReservationStatus): Promise<void> {
          await this.client.query(
               `
      UPDATE reservation
      SET status = $2,
          updated_at = NOW()
      WHERE id = $1
    `,
               [id, status]
          );
     }

     async sumActiveByProduct(productId: number): Promise<number> {
          const { rows } = await this.client.query<{ total: string | number }>(
               `
      SELECT COALESCE(SUM(quantity), 0) AS total
      FROM reservation
      WHERE product_id = $1 AND status = 'ACTIVE'
    `,
               [productId]
          );
          return toInt(rows[0].total);
     }

     async listExpired(asOf: Date, limit: number): Promise<Reservation[]> {
          const { rows } = await this.client.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM reservation
      WHERE status = 'ACTIVE' AND expires_at IS NOT NULL AND expires_at <= $1
      ORDER BY expires_at, id
      LIMIT $2
    `,
               [asOf, limit]
          );
          return rows.map(mapReservation);
     }
}
