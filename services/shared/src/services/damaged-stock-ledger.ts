import { PoolClient } from 'pg';
import { DamageMovementResult, Product, ProductKey } from '../types/billing.types';
import {
     InsufficientDamagedStockError,
     InsufficientStockError,
     InvalidQuantityError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { enqueueDomainEvent } from './domain-events';
import {
     mapProductRow,
     MAX_STOCK_QUANTITY,
     PRODUCT_COLUMNS,
     ProductCatalog,
     ProductRow,
} from './product-catalog';
import { recordStockMovement } from './stock-movements';

type Direction = 'MARK' | 'RESTORE';

/**
 * Moves units between a product's sellable and damaged buckets. The sum of the
 * two buckets never changes here.
 */
export class DamagedStockLedger {
     constructor(private readonly catalog: ProductCatalog = new ProductCatalog()) {}

     async markDamaged(
          client: PoolClient,
          key: ProductKey,
          quantity: number,
          reason?: string
     ): Promise<DamageMovementResult> {
          return this.move(client, key, quantity, 'MARK', reason);
     }

     async restore(
          client: PoolClient,
          key: ProductKey,
          quantity: number,
          reason?: string
     ): Promise<DamageMovementResult> {
          return this.move(client, key, quantity, 'RESTORE', reason);
     }

     private async move(
          client: PoolClient,
          key: ProductKey,
          quantity: number,
          direction: Direction,
          reason?: string
     ): Promise<DamageMovementResult> {
          if (!Number.isInteger(quantity) || quantity <= 0) {
               throw new InvalidQuantityError('Quantity must be a positive integer');
          }

          const product = await this.catalog.lockOne(client, key);
          this.assertAvailable(product, quantity, direction);

          const delta = direction === 'MARK' ? quantity : -quantity;

          const { rows } = await client.query<ProductRow>(
               `
      UPDATE product
      SET quantity = $1,
          damaged_quantity = $2,
          updated_at = NOW()
      WHERE id = $3
      RETURNING ${PRODUCT_COLUMNS}
    `,
               [product.quantity - delta, product.damagedQuantity + delta, product.id]
          );
          const updated = mapProductRow(rows[0]);

          await recordStockMovement(client, {
               productId: product.id,
               type: direction === 'MARK' ? 'DAMAGE_MARKED' : 'DAMAGE_RESTORED',
               quantityDelta: -delta,
               damagedDelta: delta,
               metadata: reason ? { reason } : undefined,
          });

          await enqueueDomainEvent(client, direction === 'MARK' ? 'StockDamaged' : 'StockRestored', {
               productId: updated.id,
               fullProductName: updated.fullProductName,
               quantity,
               newQuantity: updated.quantity,
               newDamagedQuantity: updated.damagedQuantity,
               reason,
               timestamp: new Date().toISOString(),
          });

          logger.info(
               {
                    productId: updated.id,
                    direction,
                    quantity,
                    newQuantity: updated.quantity,
                    newDamagedQuantity: updated.damagedQuantity,
               },
               direction === 'MARK' ? 'Stock marked damaged' : 'Damaged stock restored'
          );

          return { product: updated, quantity };
     }

     private assertAvailable(product: Product, quantity: number, direction: Direction): void {
          if (direction === 'MARK' && quantity > product.quantity) {
               throw new InsufficientStockError(
                    product.productName,
                    product.weight,
                    quantity,
                    product.quantity
               );
          }
          if (direction === 'RESTORE' && quantity > product.damagedQuantity) {
               throw new InsufficientDamagedStockError(
                    product.productName,
                    product.weight,
                    quantity,
                    product.damagedQuantity
               );
          }
          const target = direction === 'MARK' ? product.damagedQuantity : product.quantity;
          if (target + quantity > MAX_STOCK_QUANTITY) {
               throw new InvalidQuantityError(
                    `${product.fullProductName} cannot hold more than ${MAX_STOCK_QUANTITY} units`
               );
          }
     }
}
