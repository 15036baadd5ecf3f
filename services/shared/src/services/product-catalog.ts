import { PoolClient } from 'pg';
import {
     NewProduct,
     Product,
     ProductKey,
     ProductUpdate,
     StockMovement,
} from '../types/billing.types';
import {
     DuplicateProductError,
     InsufficientStockError,
     InvalidQuantityError,
     ProductInUseError,
     ProductNotFoundError,
     ValidationError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { formatMinorUnits, fromMinorUnits, MAX_PRICE, toMinorUnits } from '../utils/money';
import { normalizeProductKey, productKeyId } from '../utils/product-key';
import { listStockMovements, recordStockMovement } from './stock-movements';

export interface ProductRow {
     id: string;
     product_name: string;
     weight: string;
     full_product_name: string;
     quantity: number;
     damaged_quantity: number;
     cost_price: string;
     selling_price: string;
     created_at: Date;
     updated_at: Date;
}

export const PRODUCT_COLUMNS = `
        id,
        product_name,
        weight,
        full_product_name,
        quantity,
        damaged_quantity,
        cost_price,
        selling_price,
        created_at,
        updated_at`;

export function mapProductRow(row: ProductRow): Product {
     return {
          // PostgreSQL returns bigint and numeric as strings
          id: parseInt(String(row.id), 10),
          productName: row.product_name,
          weight: row.weight,
          fullProductName: row.full_product_name,
          quantity: parseInt(String(row.quantity), 10),
          damagedQuantity: parseInt(String(row.damaged_quantity), 10),
          costPrice: fromMinorUnits(toMinorUnits(row.cost_price)),
          sellingPrice: fromMinorUnits(toMinorUnits(row.selling_price)),
          createdAt: row.created_at,
          updatedAt: row.updated_at,
     };
}

/** Largest value of the INTEGER stock columns. */
export const MAX_STOCK_QUANTITY = 2147483647;

function assertStockQuantity(value: number, label: string): void {
     if (!Number.isInteger(value) || value < 0) {
          throw new InvalidQuantityError(`${label} must be a non-negative integer`);
     }
     if (value > MAX_STOCK_QUANTITY) {
          throw new InvalidQuantityError(`${label} must not exceed ${MAX_STOCK_QUANTITY}`);
     }
}

function assertPrice(value: number, label: string, allowZero: boolean): void {
     if (!Number.isFinite(value) || value < 0 || (!allowZero && value === 0)) {
          throw new ValidationError(
               `${label} must be ${allowZero ? 'zero or more' : 'greater than 0'}`,
               'INVALID_PRICE'
          );
     }
     if (value > MAX_PRICE) {
          throw new ValidationError(`${label} must not exceed ${MAX_PRICE}`, 'INVALID_PRICE');
     }
}

export class ProductCatalog {
     async get(client: PoolClient, key: ProductKey): Promise<Product | null> {
          const { productName, weight } = normalizeProductKey(key);

          const { rows } = await client.query<ProductRow>(
               `
      SELECT ${PRODUCT_COLUMNS}
      FROM product
      WHERE product_name = $1 AND weight = $2
    `,
               [productName, weight]
          );

          return rows.length > 0 ? mapProductRow(rows[0]) : null;
     }

     async require(client: PoolClient, key: ProductKey): Promise<Product> {
          const product = await this.get(client, key);
          if (!product) {
               const { productName, weight } = normalizeProductKey(key);
               throw new ProductNotFoundError(productName, weight);
          }
          return product;
     }

     async list(client: PoolClient): Promise<Product[]> {
          const { rows } = await client.query<ProductRow>(
               `
      SELECT ${PRODUCT_COLUMNS}
      FROM product
      ORDER BY product_name, weight
    `
          );
          return rows.map(mapProductRow);
     }

     /** Unlocked lookup of several products, keyed by productKeyId. */
     async findMany(client: PoolClient, keys: ProductKey[]): Promise<Map<string, Product>> {
          return this.selectByKeys(client, keys, false);
     }

     /**
      * Locks the rows for the given keys until the caller's transaction ends.
      * Rows are locked in (product_name, weight) order so that two transactions
      * touching overlapping products cannot deadlock. Missing keys are simply
      * absent from the result.
      */
     async lockForUpdate(client: PoolClient, keys: ProductKey[]): Promise<Map<string, Product>> {
          return this.selectByKeys(client, keys, true);
     }

     /**
      * Takes `quantity` units out of sellable stock. The product must have been
      * locked with lockForUpdate on the same client; nothing is committed here
      * and the caller records the matching stock movement.
      */
     async reserve(client: PoolClient, product: Product, quantity: number): Promise<Product> {
          if (!Number.isInteger(quantity) || quantity <= 0) {
               throw new InvalidQuantityError(
                    `Quantity must be a positive integer for ${product.fullProductName}`
               );
          }

          if (quantity > product.quantity) {
               throw new InsufficientStockError(
                    product.productName,
                    product.weight,
                    quantity,
                    product.quantity
               );
          }

          const newQuantity = product.quantity - quantity;

          await client.query(
               `
      UPDATE product
      SET quantity = $1,
          updated_at = NOW()
      WHERE id = $2
    `,
               [newQuantity, product.id]
          );

          logger.debug({ productId: product.id, quantity, newQuantity }, 'Stock reserved');

          return { ...product, quantity: newQuantity };
     }

     /**
      * Returns `quantity` units to sellable stock, e.g. when an invoice is voided.
      * Same locking contract as reserve.
      */
     async release(client: PoolClient, product: Product, quantity: number): Promise<Product> {
          const newQuantity = product.quantity + quantity;

          await client.query(
               `
      UPDATE product
      SET quantity = $1,
          updated_at = NOW()
      WHERE id = $2
    `,
               [newQuantity, product.id]
          );

          return { ...product, quantity: newQuantity };
     }

     async add(client: PoolClient, input: NewProduct): Promise<Product> {
          const { productName, weight } = normalizeProductKey(input);
          const costPrice = input.costPrice ?? 0;

          if (!productName) {
               throw new ValidationError('Product name is required', 'INVALID_PRODUCT');
          }
          assertStockQuantity(input.quantity, 'Quantity');
          assertPrice(input.sellingPrice, 'Selling price', false);
          assertPrice(costPrice, 'Cost price', true);

          const { rows } = await client.query<ProductRow>(
               `
      INSERT INTO product (product_name, weight, quantity, cost_price, selling_price)
      VALUES ($1, $2, $3, $4, $5)
      ON CONFLICT (product_name, weight) DO NOTHING
      RETURNING ${PRODUCT_COLUMNS}
    `,
               [
                    productName,
                    weight,
                    input.quantity,
                    formatMinorUnits(toMinorUnits(costPrice)),
                    formatMinorUnits(toMinorUnits(input.sellingPrice)),
               ]
          );

          if (rows.length === 0) {
               throw new DuplicateProductError(productName, weight);
          }

          const product = mapProductRow(rows[0]);

          if (product.quantity > 0) {
               await recordStockMovement(client, {
                    productId: product.id,
                    type: 'RECEIPT',
                    quantityDelta: product.quantity,
                    referenceId: 'PRODUCT_ADDED',
               });
          }

          logger.info(
               { productId: product.id, fullProductName: product.fullProductName },
               'Product added'
          );

          return product;
     }

     /**
      * Administrative correction of stock and prices. Does not go through
      * reserve; a quantity change is recorded as an ADJUSTMENT movement.
      */
     async update(client: PoolClient, key: ProductKey, fields: ProductUpdate): Promise<Product> {
          if (
               fields.quantity === undefined &&
               fields.costPrice === undefined &&
               fields.sellingPrice === undefined
          ) {
               throw new ValidationError('Nothing to update', 'INVALID_PRODUCT');
          }
          if (fields.quantity !== undefined) assertStockQuantity(fields.quantity, 'Quantity');
          if (fields.costPrice !== undefined) assertPrice(fields.costPrice, 'Cost price', true);
          if (fields.sellingPrice !== undefined) {
               assertPrice(fields.sellingPrice, 'Selling price', false);
          }

          const current = await this.lockOne(client, key);

          const quantity = fields.quantity ?? current.quantity;
          const costPrice = fields.costPrice ?? current.costPrice;
          const sellingPrice = fields.sellingPrice ?? current.sellingPrice;

          const { rows } = await client.query<ProductRow>(
               `
      UPDATE product
      SET quantity = $1,
          cost_price = $2,
          selling_price = $3,
          updated_at = NOW()
      WHERE id = $4
      RETURNING ${PRODUCT_COLUMNS}
    `,
               [
                    quantity,
                    formatMinorUnits(toMinorUnits(costPrice)),
                    formatMinorUnits(toMinorUnits(sellingPrice)),
                    current.id,
               ]
          );

          const delta = quantity - current.quantity;
          if (delta !== 0) {
               await recordStockMovement(client, {
                    productId: current.id,
                    type: 'ADJUSTMENT',
                    quantityDelta: delta,
                    referenceId: 'CATALOG_UPDATE',
                    metadata: { previousQuantity: current.quantity },
               });
          }

          logger.info({ productId: current.id, fields }, 'Product updated');

          return mapProductRow(rows[0]);
     }

     /**
      * Deletes a product that no invoice refers to. Products that have been sold
      * stay in the catalog so historical invoices keep their reference.
      */
     async remove(client: PoolClient, key: ProductKey): Promise<void> {
          const product = await this.lockOne(client, key);

          const { rows } = await client.query(
               `SELECT 1 FROM invoice_item WHERE product_id = $1 LIMIT 1`,
               [product.id]
          );
          if (rows.length > 0) {
               throw new ProductInUseError(product.productName, product.weight);
          }

          await client.query(`DELETE FROM product WHERE id = $1`, [product.id]);

          logger.info({ productId: product.id }, 'Product removed');
     }

     async history(client: PoolClient, key: ProductKey, limit: number = 50): Promise<StockMovement[]> {
          const product = await this.require(client, key);
          return listStockMovements(client, product.id, limit);
     }

     /** Locks a single product row, throwing ProductNotFoundError if it is missing. */
     async lockOne(client: PoolClient, key: ProductKey): Promise<Product> {
          const normalized = normalizeProductKey(key);
          const locked = await this.lockForUpdate(client, [normalized]);
          const product = locked.get(productKeyId(normalized));
          if (!product) {
               throw new ProductNotFoundError(normalized.productName, normalized.weight);
          }
          return product;
     }

     private async selectByKeys(
          client: PoolClient,
          keys: ProductKey[],
          forUpdate: boolean
     ): Promise<Map<string, Product>> {
          const unique = new Map<string, ProductKey>();
          for (const key of keys) {
               const normalized = normalizeProductKey(key);
               unique.set(productKeyId(normalized), normalized);
          }

          if (unique.size === 0) {
               return new Map();
          }

          const names = [...unique.values()].map((k) => k.productName);
          const weights = [...unique.values()].map((k) => k.weight);

          const { rows } = await client.query<ProductRow>(
               `
      SELECT ${PRODUCT_COLUMNS}
      FROM product
      WHERE (product_name, weight) IN (
        SELECT * FROM unnest($1::text[], $2::text[])
      )
      ORDER BY product_name, weight${forUpdate ? '\n      FOR UPDATE' : ''}
    `,
               [names, weights]
          );

          return new Map(
               rows.map((row) => {
                    const product = mapProductRow(row);
                    return [productKeyId(product), product];
               })
          );
     }
}
