import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { closePool, withTransaction } from './client';
import { ProductCatalog } from '../services/product-catalog';
import type { NewProduct } from '../types/billing.types';
import { DuplicateProductError } from '../utils/errors';
import { logger } from '../utils/logger';

const SEED_FILE = join(__dirname, 'seed-products.json');

function isNewProduct(value: unknown): value is NewProduct {
     if (typeof value !== 'object' || value === null) return false;
     const record: Record<string, unknown> = { ...value };
     return (
          typeof record.productName === 'string' &&
          (record.weight === undefined || typeof record.weight === 'string') &&
          typeof record.quantity === 'number' &&
          (record.costPrice === undefined || typeof record.costPrice === 'number') &&
          typeof record.sellingPrice === 'number'
     );
}

export function loadSeedProducts(file: string = SEED_FILE): NewProduct[] {
     const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
     if (!Array.isArray(parsed) || !parsed.every(isNewProduct)) {
          throw new Error(`${file} must be an array of products`);
     }
     return parsed;
}

async function seedDatabase(): Promise<number> {
     const catalog = new ProductCatalog();
     const products = loadSeedProducts();

     try {
          logger.info({ count: products.length }, 'Seeding product catalog');

          const added = await withTransaction(async (client) => {
               let count = 0;
               for (const product of products) {
                    try {
                         await catalog.add(client, product);
                         count++;
                    } catch (error) {
                         if (!(error instanceof DuplicateProductError)) {
                              throw error;
                         }
                         logger.debug({ product: product.productName }, 'Product already present');
                    }
               }
               return count;
          });

          logger.info({ added }, 'Database seeding completed successfully');
          return added;
     } catch (error) {
          logger.error({ err: error }, 'Seeding failed');
          throw error;
     } finally {
          await closePool();
     }
}

// Run if executed directly
if (require.main === module) {
     seedDatabase().catch((err) => {
          logger.fatal({ err }, 'Seed error');
          process.exit(1);
     });
}

export { seedDatabase };
