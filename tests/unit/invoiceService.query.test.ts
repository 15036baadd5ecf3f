import { InvoiceService } from '@stockbill/shared/src/services/invoice-service';
import {
     InsufficientStockError,
     InvoiceAlreadyVoidedError,
     InvoiceNotFoundError,
} from '@stockbill/shared/src/utils/errors';
import { createMockClient, FIXED_DATE, productRow } from '../helpers/mockClient';

const service = new InvoiceService({
     gstRatePercent: 18,
     invoiceNumberPrefix: 'INV',
     invoiceNumberPadding: 6,
     transactionRetries: 1,
});

const VOIDED_AT = new Date('2026-01-06T09:30:00.000Z');

const issuedRow = {
     id: '7',
     invoice_number: '42',
     status: 'ISSUED',
     customer_name: 'Asha Traders',
     customer_phone: null,
     customer_address: null,
     subtotal: '1500.00',
     cgst_rate: '9.00',
     sgst_rate: '9.00',
     cgst_amount: '135.00',
     sgst_amount: '135.00',
     total_amount: '1770.00',
     created_at: FIXED_DATE,
     voided_at: null,
     void_reason: null,
};

const itemRows = [
     {
          line_number: 1,
          product_id: '1',
          product_name: 'Rice',
          weight: '5kg',
          quantity: 3,
          unit_price: '500.00',
          line_total: '1500.00',
     },
];

describe('InvoiceService - quote, lookup and void (Unit)', () => {
     describe('quoteInvoice', () => {
          it('should price lines without locking or writing', async () => {
               const mock = createMockClient([[/FROM product/, [productRow()]]]);

               const quote = await service.quoteInvoice(mock.client, [
                    { productName: 'Rice', weight: '5kg', quantity: 3 },
               ]);

               expect(quote).toEqual({
                    subtotal: 1500,
                    cgstRate: 9,
                    sgstRate: 9,
                    cgst: 135,
                    sgst: 135,
                    total: 1770,
                    items: [
                         {
                              lineNumber: 1,
                              productName: 'Rice',
                              weight: '5kg',
                              fullProductName: 'Rice (5kg)',
                              quantity: 3,
                              unitPrice: 500,
                              lineTotal: 1500,
                         },
                    ],
               });

               const sql = mock.calls().map((c) => c.sql);
               expect(sql).toHaveLength(1);
               expect(sql[0]).not.toContain('FOR UPDATE');
          });

          it('should report insufficient stock in a quote', async () => {
               const mock = createMockClient([[/FROM product/, [productRow({ quantity: 1 })]]]);

               await expect(
                    service.quoteInvoice(mock.client, [
                         { productName: 'Rice', weight: '5kg', quantity: 3 },
                    ])
               ).rejects.toThrow(InsufficientStockError);
          });
     });

     describe('getInvoice', () => {
          it('should load the header and its items in line order', async () => {
               const mock = createMockClient([
                    [/FROM invoice_item/, itemRows],
                    [/FROM invoice\s/, [issuedRow]],
               ]);

               const invoice = await service.getInvoice(mock.client, 42);

               expect(invoice.displayNumber).toBe('INV-000042');
               expect(invoice.customer).toEqual({ name: 'Asha Traders' });
               expect(invoice.total).toBe(1770);
               expect(invoice.cgstRate).toBe(9);
               expect(invoice.items).toEqual([
                    {
                         lineNumber: 1,
                         productId: 1,
                         productName: 'Rice',
                         weight: '5kg',
                         fullProductName: 'Rice (5kg)',
                         quantity: 3,
                         unitPrice: 500,
                         lineTotal: 1500,
                    },
               ]);
               expect(mock.callsMatching(/FROM invoice_item/)[0].values).toEqual([7]);
          });

          it('should throw InvoiceNotFoundError for an unknown number', async () => {
               const mock = createMockClient();

               await expect(service.getInvoice(mock.client, 99)).rejects.toThrow(
                    InvoiceNotFoundError
               );
          });
     });

     describe('listInvoices', () => {
          it('should clamp the page size', async () => {
               const mock = createMockClient([[/FROM invoice\s/, [issuedRow]]]);

               const invoices = await service.listInvoices(mock.client, { limit: 500, offset: -3 });

               expect(invoices).toHaveLength(1);
               expect(mock.calls()[0].values).toEqual([100, 0]);
          });
     });

     describe('voidInvoice', () => {
          function voidClient(header = issuedRow) {
               return createMockClient([
                    [
                         /UPDATE invoice\s/,
                         (values) => [
                              {
                                   ...header,
                                   status: 'VOIDED',
                                   voided_at: VOIDED_AT,
                                   void_reason: values[1],
                              },
                         ],
                    ],
                    [/FROM invoice_item/, itemRows],
                    [/FROM invoice\s/, [header]],
                    [/FROM product/, [productRow({ quantity: 7 })]],
               ]);
          }

          it('should return stock, record the movement and mark the invoice voided', async () => {
               const mock = voidClient();

               const invoice = await service.voidInvoice(mock.client, 42, 'Returned');

               expect(invoice.status).toBe('VOIDED');
               expect(invoice.voidReason).toBe('Returned');
               expect(invoice.voidedAt).toEqual(VOIDED_AT);
               expect(invoice.total).toBe(1770);
               expect(invoice.items).toHaveLength(1);

               expect(mock.callsMatching(/^UPDATE product/).map((c) => c.values)).toEqual([[10, 1]]);

               const [movement] = mock.callsMatching(/^INSERT INTO stock_ledger/);
               expect(movement.values).toEqual([
                    1,
                    'INVOICE_VOID',
                    3,
                    0,
                    'INV-000042',
                    JSON.stringify({ reason: 'Returned' }),
               ]);

               const [event] = mock.callsMatching(/^INSERT INTO domain_event/);
               expect(event.values[0]).toBe('InvoiceVoided');
               expect(JSON.parse(String(event.values[1]))).toMatchObject({
                    invoiceNumber: 42,
                    reason: 'Returned',
               });
          });

          it('should lock the invoice row before anything else', async () => {
               const mock = voidClient();

               await service.voidInvoice(mock.client, 42, 'Returned');

               const [first] = mock.calls();
               expect(first.sql).toContain('FROM invoice WHERE invoice_number = $1 FOR UPDATE');
               expect(first.values).toEqual([42]);
          });

          it('should refuse to void twice', async () => {
               const mock = voidClient({
                    ...issuedRow,
                    status: 'VOIDED',
               });

               await expect(service.voidInvoice(mock.client, 42, 'Again')).rejects.toThrow(
                    InvoiceAlreadyVoidedError
               );
               expect(mock.callsMatching(/^UPDATE product/)).toHaveLength(0);
          });

          it('should throw InvoiceNotFoundError for an unknown number', async () => {
               const mock = createMockClient();

               await expect(service.voidInvoice(mock.client, 5, 'Returned')).rejects.toThrow(
                    'Invoice 5 not found'
               );
          });
     });
});
