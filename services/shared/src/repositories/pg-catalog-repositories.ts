import { PoolClient } from 'pg';
import type { Product, Stock, StockStatus } from '../types/commerce.types';
import type { NewStock, ProductRepository, StockRepository } from './types';
import { toInt } from './rows';

interface ProductRow {
     id: string | number;
     sku: string;
     name: string;
     created_at: Date;
}

interface StockRow {
     product_id: string | number;
     current_quantity: number;
     reserved_quantity: number;
     available_quantity: number;
     min_quantity: number;
     max_quantity: number;
     reorder_quantity: number;
     status: StockStatus;
     discontinued: boolean;
     auto_reorder: boolean;
     last_movement_at: Date | null;
     updated_at: Date;
}

const STOCK_COLUMNS = `
  product_id,
  current_quantity,
  reserved_quantity,
  available_quantity,
  min_quantity,
  max_quantity,
  reorder_quantity,
  status,
  discontinued,
  auto_reorder,
  last_movement_at,
  updated_at
`;

function mapProduct(row: ProductRow): Product {
     return {
          id: toInt(row.id),
          sku: row.sku,
          name: row.name,
          createdAt: row.created_at,
     };
}

function mapStock(row: StockRow): Stock {
     return {
          productId: toInt(row.product_id),
          currentQuantity: row.current_quantity,
          reservedQuantity: row.reserved_quantity,
          availableQuantity: row.available_quantity,
          minQuantity: row.min_quantity,
          maxQuantity: row.max_quantity,
          reorderQuantity: row.reorder_quantity,
          status: row.status,
          discontinued: row.discontinued,
          autoReorder: row.auto_reorder,
          lastMovementAt: row.last_movement_at,
          updatedAt: row.updated_at,
     };
}

export class PgProductRepository implements ProductRepository {
     constructor(private readonly client: PoolClient) {}

     async insert(product: Pick<Product, 'sku' | 'name'>): Promise<Product> {
          const { rows } = await this.client.query<ProductRow>(
               `
      INSERT INTO product (sku, name)
      VALUES ($1, $2)
      RETURNING id, sku, name, created_at
    `,
               [product.sku, product.name]
          );
          return mapProduct(rows[0]);
     }

     async findById(id: number): Promise<Product | null> {
          const { rows } = await this.client.query<ProductRow>(
               `SELECT id, sku, name, created_at FROM product WHERE id = $1`,
               [id]
          );
          return rows.length > 0 ? mapProduct(rows[0]) : null;
     }

     async findBySku(sku: string): Promise<Product | null> {
          const { rows } = await this.client.query<ProductRow>(
               `SELECT id, sku, name, created_at FROM product WHERE sku = $1`,
               [sku]
          );
          return rows.length > 0 ? mapProduct(rows[0]) : null;
     }
}

export class PgStockRepository implements StockRepository {
     constructor(private readonly client: PoolClient) {}

     async insert(stock: NewStock): Promise<Stock> {
          const { rows } = await this.client.query<StockRow>(
               `
      INSERT INTO stock (
        product_id,
        current_quantity,
        reserved_quantity,
        min_quantity,
        max_quantity,
        reorder_quantity,
        status,
        discontinued,
        auto_reorder
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      RETURNING ${STOCK_COLUMNS}
    `,
               [
                    stock.productId,
                    stock.currentQuantity,
                    stock.reservedQuantity,
                    stock.minQuantity,
                    stock.maxQuantity,
                    stock.reorderQuantity,
                    stock.status,
                    stock.discontinued,
                    stock.autoReorder,
               ]
          );
          return mapStock(rows[0]);
     }

     async findByProductId(productId: number): Promise<Stock | null> {
          const { rows } = await this.client.query<StockRow>(
               `SELECT ${STOCK_COLUMNS} FROM stock WHERE product_id = $1`,
               [productId]
          );
          return rows.length > 0 ? mapStock(rows[0]) : null;
     }

     async lockByProductIds(productIds: number[]): Promise<Stock[]> {
          const ids = [...new Set(productIds)].sort((a, b) => a - b);
          const { rows } = await this.client.query<StockRow>(
               `
      SELECT ${STOCK_COLUMNS}
      FROM stock
      WHERE product_id = ANY($1::bigint[])
      ORDER BY product_id
      FOR UPDATE
    `,
               [ids]
          );
          return rows.map(mapStock);
     }

     async update(stock: Stock): Promise<void> {
          await this.client.query(
               `
      UPDATE stock
      SET current_quantity = $2,
          reserved_quantity = $3,
          min_quantity = $4,
          max_quantity = $5,
          reorder_quantity = $6,
          status = $7,
          discontinued = $8,
          auto_reorder = $9,
          last_movement_at = $10,
          updated_at = NOW()
      WHERE product_id = $1
    `,
               [
                    stock.productId,
                    stock.currentQuantity,
                    stock.reservedQuantity,
                    stock.minQuantity,
                    stock.maxQuantity,
                    stock.reorderQuantity,
                    stock.status,
                    stock.discontinued,
                    stock.autoReorder,
                    stock.lastMovementAt,
               ]
          );
     }

     async listAll(): Promise<Stock[]> {
          const { rows } = await this.client.query<StockRow>(
               `SELECT ${STOCK_COLUMNS} FROM stock ORDER BY product_id`
          );
          return rows.map(mapStock);
     }
}
