import { promises as fs } from 'fs';
import { join } from 'path';
import { pool, withTransaction } from './client';
import { logger } from '../utils/logger';

const MIGRATIONS_TABLE = `
     CREATE TABLE IF NOT EXISTS schema_migration (
          file_name TEXT PRIMARY KEY,
          applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )
`;

/** SQL files not yet recorded in schema_migration, in file name order */
export function pendingMigrations(files: string[], applied: Iterable<string>): string[] {
     const done = new Set(applied);
     return files.filter((f) => f.endsWith('.sql') && !done.has(f)).sort();
}

async function runMigrations() {
     const migrationsDir = join(__dirname, 'migrations');

     try {
          await pool.query(MIGRATIONS_TABLE);

          const files = await fs.readdir(migrationsDir);
          const applied = await pool.query<{ file_name: string }>('SELECT file_name FROM schema_migration');
          const pending = pendingMigrations(files, applied.rows.map((r) => r.file_name));

          logger.info({ applied: applied.rows.length, pending: pending.length }, 'Running database migrations');

          for (const file of pending) {
               const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');

               logger.info({ file }, 'Executing migration');
               await withTransaction(async (client) => {
                    await client.query(sql);
                    await client.query('INSERT INTO schema_migration (file_name) VALUES ($1)', [file]);
               });
               logger.info({ file }, 'Migration completed');
          }

          logger.info('All migrations completed successfully');
     } catch (error) {
          logger.error({ error }, 'Migration failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     runMigrations().catch((err) => {
          logger.fatal({ err }, 'Migration error');
          process.exit(1);
     });
}

export { runMigrations };
