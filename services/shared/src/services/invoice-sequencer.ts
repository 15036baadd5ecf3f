import { PoolClient } from 'pg';

/**
 * Issues invoice numbers from the invoice_number_seq sequence. Sequence values
 * survive restarts, are unique across concurrent callers and are not handed
 * back when the surrounding transaction rolls back.
 */
export class InvoiceSequencer {
     async next(client: PoolClient): Promise<number> {
          const { rows } = await client.query<{ invoice_number: string }>(
               `SELECT nextval('invoice_number_seq') AS invoice_number`
          );

          if (rows.length === 0) {
               throw new Error('invoice_number_seq returned no value');
          }

          return parseInt(String(rows[0].invoice_number), 10);
     }
}

export function formatInvoiceNumber(invoiceNumber: number, prefix: string, padding: number): string {
     return `${prefix}-${String(invoiceNumber).padStart(padding, '0')}`;
}
