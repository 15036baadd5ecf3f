import { promises as fs } from 'fs';
import { join } from 'path';
import { closePool, pool, withTransaction } from './client';
import { logger } from '../utils/logger';

const MIGRATIONS_DIR = join(__dirname, 'migrations');

/**
 * Applies every pending .sql file in lexical order, one transaction per file,
 * and records it in schema_migration so reruns are no-ops.
 */
async function runMigrations(): Promise<string[]> {
     const applied: string[] = [];

     try {
          await pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migration (
        name TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

          const { rows } = await pool.query<{ name: string }>('SELECT name FROM schema_migration');
          const done = new Set(rows.map((r) => r.name));

          const files = await fs.readdir(MIGRATIONS_DIR);
          const pending = files.filter((f) => f.endsWith('.sql') && !done.has(f)).sort();

          logger.info({ pending: pending.length, applied: done.size }, 'Running database migrations');

          for (const file of pending) {
               const sql = await fs.readFile(join(MIGRATIONS_DIR, file), 'utf-8');

               logger.info({ file }, 'Executing migration');
               await withTransaction(async (client) => {
                    await client.query(sql);
                    await client.query('INSERT INTO schema_migration (name) VALUES ($1)', [file]);
               });
               applied.push(file);
          }

          logger.info({ applied }, 'Migrations completed');
          return applied;
     } catch (error) {
          logger.error({ err: error }, 'Migration failed');
          throw error;
     } finally {
          await closePool();
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
