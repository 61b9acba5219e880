import { promises as fs } from 'fs';
import { join } from 'path';
import { pool } from './client';
import { UnitOfWorkRunner, withUnitOfWork } from './unit-of-work';
import { CommerceServices, createCommerceServices } from '../services/container';
import type { RequestContext } from '../types/commerce.types';
import { logger } from '../utils/logger';

export interface SeedProduct {
     sku: string;
     name: string;
     initialQuantity: number;
     minQuantity?: number;
     maxQuantity?: number;
     reorderQuantity?: number;
     autoReorder?: boolean;
}

const SEED_CONTEXT: RequestContext = { actor: 'system:seed', origin: 'db-seed' };

async function loadSeedProducts(): Promise<SeedProduct[]> {
     const raw = await fs.readFile(join(__dirname, 'seed-products.json'), 'utf-8');
     const parsed: unknown = JSON.parse(raw);
     if (!Array.isArray(parsed)) {
          throw new Error('seed-products.json must contain an array');
     }
     return parsed.map((entry: unknown, index: number): SeedProduct => {
          if (typeof entry !== 'object' || entry === null) {
               throw new Error(`Seed product ${index} is not an object`);
          }
          const record = new Map(Object.entries(entry));
          const sku = record.get('sku');
          const name = record.get('name');
          const initialQuantity = record.get('initialQuantity');
          if (typeof sku !== 'string' || typeof name !== 'string' || typeof initialQuantity !== 'number') {
               throw new Error(`Seed product ${index} needs sku, name and initialQuantity`);
          }
          const optionalNumber = (key: string): number | undefined => {
               const value = record.get(key);
               return typeof value === 'number' ? value : undefined;
          };
          return {
               sku,
               name,
               initialQuantity,
               minQuantity: optionalNumber('minQuantity'),
               maxQuantity: optionalNumber('maxQuantity'),
               reorderQuantity: optionalNumber('reorderQuantity'),
               autoReorder: record.get('autoReorder') === true,
          };
     });
}

/**
 * Create each seed product with its opening stock, one transaction per product.
 * Products whose SKU already exists are left alone. Returns how many were created.
 */
async function seedProducts(
     run: UnitOfWorkRunner,
     services: CommerceServices,
     seeds: SeedProduct[]
): Promise<number> {
     const { products, ledger } = services;
     let created = 0;
     for (const seed of seeds) {
          await run(async (uow) => {
               if (await uow.products.findBySku(seed.sku)) {
                    logger.debug({ sku: seed.sku }, 'Product already seeded');
                    return;
               }

               const { product } = await products.createProduct(uow, SEED_CONTEXT, {
                    sku: seed.sku,
                    name: seed.name,
                    thresholds: {
                         minQuantity: seed.minQuantity,
                         maxQuantity: seed.maxQuantity,
                         reorderQuantity: seed.reorderQuantity,
                    },
                    autoReorder: seed.autoReorder,
               });
               if (seed.initialQuantity > 0) {
                    await ledger.add(uow, SEED_CONTEXT, product.id, seed.initialQuantity, 'Initial stock load');
               }
               created += 1;
          });
     }
     return created;
}

async function seedDatabase() {
     try {
          logger.info('Seeding database with catalog data');
          const seeds = await loadSeedProducts();
          const created = await seedProducts(withUnitOfWork, createCommerceServices(), seeds);
          logger.info({ created, total: seeds.length }, 'Database seeding completed successfully');
     } catch (error) {
          logger.error({ error }, 'Seeding failed');
          throw error;
     } finally {
          await pool.end();
     }
}

if (require.main === module) {
     seedDatabase().catch((err) => {
          logger.fatal({ err }, 'Seed error');
          process.exit(1);
     });
}

export { seedDatabase, seedProducts, loadSeedProducts };
