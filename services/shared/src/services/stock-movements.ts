import { PoolClient } from 'pg';
import { StockMovement, StockMovementType } from '../types/billing.types';

export interface StockMovementEntry {
     productId: number;
     type: StockMovementType;
     quantityDelta: number;
     damagedDelta?: number;
     referenceId?: string;
     metadata?: Record<string, unknown>;
}

interface StockMovementRow {
     id: string;
     product_id: string;
     type: StockMovementType;
     quantity_delta: number;
     damaged_delta: number;
     reference_id: string | null;
     metadata: Record<string, unknown> | null;
     created_at: Date;
}

export async function recordStockMovement(
     client: PoolClient,
     entry: StockMovementEntry
): Promise<void> {
     await client.query(
          `
      INSERT INTO stock_ledger (
        product_id,
        type,
        quantity_delta,
        damaged_delta,
        reference_id,
        metadata
      ) VALUES ($1, $2, $3, $4, $5, $6::jsonb)
    `,
          [
               entry.productId,
               entry.type,
               entry.quantityDelta,
               entry.damagedDelta ?? 0,
               entry.referenceId ?? null,
               entry.metadata ? JSON.stringify(entry.metadata) : null,
          ]
     );
}

export async function listStockMovements(
     client: PoolClient,
     productId: number,
     limit: number
): Promise<StockMovement[]> {
     const { rows } = await client.query<StockMovementRow>(
          `
      SELECT id, product_id, type, quantity_delta, damaged_delta, reference_id, metadata, created_at
      FROM stock_ledger
      WHERE product_id = $1
      ORDER BY created_at DESC, id DESC
      LIMIT $2
    `,
          [productId, limit]
     );

     return rows.map((row) => ({
          id: parseInt(String(row.id), 10),
          productId: parseInt(String(row.product_id), 10),
          type: row.type,
          quantityDelta: row.quantity_delta,
          damagedDelta: row.damaged_delta,
          referenceId: row.reference_id || undefined,
          metadata: row.metadata || undefined,
          createdAt: row.created_at,
     }));
}
