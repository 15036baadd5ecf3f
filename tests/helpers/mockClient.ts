import type { PoolClient } from 'pg';
import type { ProductRow } from '@stockbill/shared/src/services/product-catalog';

type Row = object;
export type Responder = Row[] | ((values: unknown[]) => Row[]);

/**
 * In-process stand-in for a pg PoolClient. Each query is answered by the first
 * route whose pattern matches its SQL; unmatched queries return no rows.
 */
export function createMockClient(routes: Array<[RegExp, Responder]> = []) {
     const query = jest.fn(async (text: string, values: unknown[] = []) => {
          for (const [pattern, responder] of routes) {
               if (pattern.test(text)) {
                    const rows = typeof responder === 'function' ? responder(values) : responder;
                    return { rows, rowCount: rows.length };
               }
          }
          return { rows: [], rowCount: 0 };
     });

     const client = { query, release: jest.fn() } as unknown as PoolClient;

     const calls = () =>
          query.mock.calls.map(([text, values]) => ({
               sql: compact(text),
               values: values ?? [],
          }));

     return {
          client,
          query,
          calls,
          callsMatching: (pattern: RegExp) => calls().filter((c) => pattern.test(c.sql)),
     };
}

export function compact(sql: string): string {
     return sql.replace(/\s+/g, ' ').trim();
}

export const FIXED_DATE = new Date('2026-01-05T10:00:00.000Z');

export function productRow(overrides: Partial<ProductRow> = {}): ProductRow {
     const productName = overrides.product_name ?? 'Rice';
     const weight = overrides.weight ?? '5kg';
     return {
          id: '1',
          quantity: 10,
          damaged_quantity: 0,
          cost_price: '420.00',
          selling_price: '500.00',
          created_at: FIXED_DATE,
          updated_at: FIXED_DATE,
          ...overrides,
          product_name: productName,
          weight,
          full_product_name:
               overrides.full_product_name ?? (weight ? `${productName} (${weight})` : productName),
     };
}

/** Echoes the parameters of the invoice INSERT back as the stored row. */
export function invoiceRowFromInsert(values: unknown[], id: string = '7'): Row {
     return {
          id,
          invoice_number: String(values[0]),
          status: 'ISSUED',
          customer_name: values[1],
          customer_phone: values[2],
          customer_address: values[3],
          subtotal: values[4],
          cgst_rate: String(values[5]),
          sgst_rate: String(values[6]),
          cgst_amount: values[7],
          sgst_amount: values[8],
          total_amount: values[9],
          created_at: FIXED_DATE,
          voided_at: null,
          void_reason: null,
     };
}
