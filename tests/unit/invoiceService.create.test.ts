import { InvoiceService } from '@stockbill/shared/src/services/invoice-service';
import {
     EmptyInvoiceError,
     InsufficientStockError,
     InvalidCustomerError,
     InvalidQuantityError,
     UnknownProductError,
     ValidationError,
} from '@stockbill/shared/src/utils/errors';
import type { BillingConfig } from '@stockbill/shared/src/utils/config';
import {
     createMockClient,
     FIXED_DATE,
     invoiceRowFromInsert,
     productRow,
     Responder,
} from '../helpers/mockClient';

const config: BillingConfig = {
     gstRatePercent: 18,
     invoiceNumberPrefix: 'INV',
     invoiceNumberPadding: 6,
     transactionRetries: 1,
};

const customer = { name: 'Asha Traders', phone: '9876543210' };

function billingClient(products: Responder, nextNumber: string = '42') {
     return createMockClient([
          [/nextval/, [{ invoice_number: nextNumber }]],
          [/INSERT INTO invoice_item/, []],
          [/INSERT INTO invoice \(/, (values) => [invoiceRowFromInsert(values)]],
          [/FROM product/, products],
     ]);
}

describe('InvoiceService - createInvoice (Unit)', () => {
     let service: InvoiceService;

     beforeEach(() => {
          service = new InvoiceService(config);
     });

     describe('Successful invoice', () => {
          it('should price, reserve, number and persist a single-line invoice', async () => {
               const mock = billingClient([productRow()]);

               const invoice = await service.createInvoice(mock.client, {
                    customer,
                    lines: [{ productName: 'Rice', weight: '5kg', quantity: 3 }],
               });

               expect(invoice).toEqual({
                    id: 7,
                    invoiceNumber: 42,
                    displayNumber: 'INV-000042',
                    status: 'ISSUED',
                    customer: { name: 'Asha Traders', phone: '9876543210' },
                    subtotal: 1500,
                    cgstRate: 9,
                    sgstRate: 9,
                    cgst: 135,
                    sgst: 135,
                    total: 1770,
                    createdAt: FIXED_DATE,
                    items: [
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
                    ],
               });
          });

          it('should lock products, then reserve, then number, then persist', async () => {
               const mock = billingClient([productRow()]);

               await service.createInvoice(mock.client, {
                    customer,
                    lines: [{ productName: 'Rice', weight: '5kg', quantity: 3 }],
               });

               const sql = mock.calls().map((c) => c.sql);
               const lockAt = sql.findIndex((s) => s.includes('FOR UPDATE'));
               const reserveAt = sql.findIndex((s) => s.startsWith('UPDATE product'));
               const numberAt = sql.findIndex((s) => s.includes('nextval'));
               const insertAt = sql.findIndex((s) => s.startsWith('INSERT INTO invoice ('));

               expect(lockAt).toBe(0);
               expect(reserveAt).toBeGreaterThan(lockAt);
               expect(numberAt).toBeGreaterThan(reserveAt);
               expect(insertAt).toBeGreaterThan(numberAt);
          });

          it('should lock rows in key order with FOR UPDATE', async () => {
               const mock = billingClient([productRow()]);

               await service.createInvoice(mock.client, {
                    customer,
                    lines: [{ productName: ' Rice ', weight: '5kg', quantity: 1 }],
               });

               const [lock] = mock.callsMatching(/FOR UPDATE/);
               expect(lock.sql).toContain('ORDER BY product_name, weight FOR UPDATE');
               expect(lock.values).toEqual([['Rice'], ['5kg']]);
          });

          it('should decrement stock and write the invoice amounts', async () => {
               const mock = billingClient([productRow()]);

               await service.createInvoice(mock.client, {
                    customer: { ...customer, address: '12 Market Road' },
                    lines: [{ productName: 'Rice', weight: '5kg', quantity: 3 }],
               });

               const [reserve] = mock.callsMatching(/^UPDATE product/);
               expect(reserve.values).toEqual([7, 1]);

               const [header] = mock.callsMatching(/^INSERT INTO invoice \(/);
               expect(header.values).toEqual([
                    42,
                    'Asha Traders',
                    '9876543210',
                    '12 Market Road',
                    '1500.00',
                    9,
                    9,
                    '135.00',
                    '135.00',
                    '1770.00',
               ]);

               const [item] = mock.callsMatching(/^INSERT INTO invoice_item/);
               expect(item.values).toEqual([7, 1, 1, 'Rice', '5kg', 3, '500.00', '1500.00']);
          });

          it('should record an INVOICE_SALE movement and an InvoiceCreated event', async () => {
               const mock = billingClient([productRow()]);

               await service.createInvoice(mock.client, {
                    customer,
                    lines: [{ productName: 'Rice', weight: '5kg', quantity: 3 }],
               });

               const [movement] = mock.callsMatching(/^INSERT INTO stock_ledger/);
               expect(movement.values).toEqual([1, 'INVOICE_SALE', -3, 0, 'INV-000042', null]);

               const [event] = mock.callsMatching(/^INSERT INTO domain_event/);
               expect(event.values[0]).toBe('InvoiceCreated');
               expect(JSON.parse(String(event.values[1]))).toEqual({
                    invoiceNumber: 42,
                    customerName: 'Asha Traders',
                    total: 1770,
                    lines: [{ productId: 1, quantity: 3, unitPrice: 500 }],
                    timestamp: FIXED_DATE.toISOString(),
               });
          });

          it('should reserve products in order of first appearance', async () => {
               const mock = billingClient([
                    productRow(),
                    productRow({
                         id: '2',
                         product_name: 'Sugar',
                         weight: '1kg',
                         quantity: 50,
                         selling_price: '48.00',
                    }),
               ]);

               const invoice = await service.createInvoice(mock.client, {
                    customer,
                    lines: [
                         { productName: 'Sugar', weight: '1kg', quantity: 5 },
                         { productName: 'Rice', weight: '5kg', quantity: 2 },
                    ],
               });

               expect(mock.callsMatching(/^UPDATE product/).map((c) => c.values)).toEqual([
                    [45, 2],
                    [8, 1],
               ]);
               expect(invoice.items.map((i) => i.fullProductName)).toEqual([
                    'Sugar (1kg)',
                    'Rice (5kg)',
               ]);
               // 5 * 48 + 2 * 500 = 1240; 9% of 1240 = 111.60
               expect(invoice.subtotal).toBe(1240);
               expect(invoice.cgst).toBe(111.6);
               expect(invoice.total).toBe(1463.2);
          });

          it('should sum repeated lines for the same product into one reservation', async () => {
               const mock = billingClient([productRow({ quantity: 20 })]);

               const invoice = await service.createInvoice(mock.client, {
                    customer,
                    lines: [
                         { productName: 'Rice', weight: '5kg', quantity: 6 },
                         { productName: 'Rice', weight: '5kg', quantity: 6 },
                    ],
               });

               expect(mock.callsMatching(/^UPDATE product/).map((c) => c.values)).toEqual([[8, 1]]);
               expect(invoice.items).toHaveLength(2);
               expect(invoice.subtotal).toBe(6000);
          });

          it('should accept products without a weight variant', async () => {
               const mock = billingClient([
                    productRow({ product_name: 'Rock Salt', weight: '', selling_price: '35.00' }),
               ]);

               const invoice = await service.createInvoice(mock.client, {
                    customer: { name: 'Walk-in' },
                    lines: [{ productName: 'Rock Salt', quantity: 2 }],
               });

               expect(invoice.items[0].fullProductName).toBe('Rock Salt');
               expect(invoice.customer).toEqual({ name: 'Walk-in' });
          });
     });

     describe('Rejected invoices', () => {
          it('should reject an invoice with no lines before touching the store', async () => {
               const mock = billingClient([productRow()]);

               await expect(
                    service.createInvoice(mock.client, { customer, lines: [] })
               ).rejects.toThrow(EmptyInvoiceError);
               expect(mock.query).not.toHaveBeenCalled();
          });

          it.each([0, -2, 2.5])('should reject quantity %p', async (quantity) => {
               const mock = billingClient([productRow()]);

               await expect(
                    service.createInvoice(mock.client, {
                         customer,
                         lines: [{ productName: 'Rice', weight: '5kg', quantity }],
                    })
               ).rejects.toThrow(InvalidQuantityError);
               expect(mock.query).not.toHaveBeenCalled();
          });

          it('should require a customer name', async () => {
               const mock = billingClient([productRow()]);

               await expect(
                    service.createInvoice(mock.client, {
                         customer: { name: '   ' },
                         lines: [{ productName: 'Rice', weight: '5kg', quantity: 1 }],
                    })
               ).rejects.toThrow(InvalidCustomerError);
          });

          it('should reject a phone number with non-digits', async () => {
               const mock = billingClient([productRow()]);

               await expect(
                    service.createInvoice(mock.client, {
                         customer: { name: 'Asha Traders', phone: '98765-43210' },
                         lines: [{ productName: 'Rice', weight: '5kg', quantity: 1 }],
                    })
               ).rejects.toThrow('Phone number should contain only digits');
          });

          it('should reject an unknown product', async () => {
               const mock = billingClient([productRow()]);

               const error = await service
                    .createInvoice(mock.client, {
                         customer,
                         lines: [
                              { productName: 'Rice', weight: '5kg', quantity: 1 },
                              { productName: 'Sugar', weight: '1kg', quantity: 1 },
                         ],
                    })
                    .catch((e: unknown) => e);

               expect(error).toBeInstanceOf(UnknownProductError);
               expect(error).toHaveProperty('message', 'Product "Sugar (1kg)" not found');
               expect(mock.callsMatching(/^UPDATE product/)).toHaveLength(0);
          });

          it('should report the shortfall and change nothing when stock is insufficient', async () => {
               const mock = billingClient([productRow({ quantity: 2 })]);

               const error = await service
                    .createInvoice(mock.client, {
                         customer,
                         lines: [{ productName: 'Rice', weight: '5kg', quantity: 5 }],
                    })
                    .catch((e: unknown) => e);

               expect(error).toBeInstanceOf(InsufficientStockError);
               expect(error).toMatchObject({
                    productName: 'Rice',
                    weight: '5kg',
                    requested: 5,
                    available: 2,
                    message: 'Insufficient stock for "Rice (5kg)": requested 5, available 2',
               });
               expect(mock.callsMatching(/^UPDATE product/)).toHaveLength(0);
               expect(mock.callsMatching(/nextval/)).toHaveLength(0);
          });

          it('should check repeated lines against their combined quantity', async () => {
               const mock = billingClient([productRow({ quantity: 10 })]);

               await expect(
                    service.createInvoice(mock.client, {
                         customer,
                         lines: [
                              { productName: 'Rice', weight: '5kg', quantity: 6 },
                              { productName: 'Rice', weight: '5kg', quantity: 6 },
                         ],
                    })
               ).rejects.toMatchObject({ requested: 12, available: 10 });
               expect(mock.callsMatching(/^UPDATE product/)).toHaveLength(0);
          });

          it('should reject an invoice whose total cannot be stored before numbering it', async () => {
               const mock = billingClient([
                    productRow({ quantity: 2147483647, selling_price: '9999999999.99' }),
               ]);

               const error = await service
                    .createInvoice(mock.client, {
                         customer,
                         lines: [{ productName: 'Rice', weight: '5kg', quantity: 2147483647 }],
                    })
                    .catch((e: unknown) => e);

               expect(error).toBeInstanceOf(ValidationError);
               expect(error).toHaveProperty('code', 'AMOUNT_OUT_OF_RANGE');
               expect(mock.callsMatching(/^UPDATE product/)).toHaveLength(0);
               expect(mock.callsMatching(/nextval/)).toHaveLength(0);
          });

          it('should propagate a numbering failure without persisting the invoice', async () => {
               const mock = createMockClient([
                    [
                         /nextval/,
                         () => {
                              throw new Error('sequence unavailable');
                         },
                    ],
                    [/FROM product/, [productRow()]],
               ]);

               await expect(
                    service.createInvoice(mock.client, {
                         customer,
                         lines: [{ productName: 'Rice', weight: '5kg', quantity: 1 }],
                    })
               ).rejects.toThrow('sequence unavailable');
               expect(mock.callsMatching(/^INSERT INTO invoice/)).toHaveLength(0);
          });
     });

     describe('Sequential invoices on one product', () => {
          /** The lock SELECT reads the row the previous reservation wrote. */
          function sharedStockClient(initialQuantity: number) {
               const stock = { quantity: initialQuantity };
               const mock = createMockClient([
                    [
                         /^\s*UPDATE product/,
                         (values) => {
                              stock.quantity = Number(values[0]);
                              return [];
                         },
                    ],
                    [/nextval/, [{ invoice_number: '42' }]],
                    [/INSERT INTO invoice_item/, []],
                    [/INSERT INTO invoice \(/, (values) => [invoiceRowFromInsert(values)]],
                    [/FROM product/, () => [productRow({ quantity: stock.quantity })]],
               ]);
               return { ...mock, stock };
          }

          it('should refuse a second invoice once the first has taken the stock', async () => {
               const mock = sharedStockClient(5);
               const request = {
                    customer,
                    lines: [{ productName: 'Rice', weight: '5kg', quantity: 3 }],
               };

               await service.createInvoice(mock.client, request);
               expect(mock.stock.quantity).toBe(2);

               const error = await service.createInvoice(mock.client, request).catch((e: unknown) => e);

               expect(error).toBeInstanceOf(InsufficientStockError);
               expect(error).toMatchObject({ code: 'INSUFFICIENT_STOCK', requested: 3, available: 2 });
               expect(mock.callsMatching(/^UPDATE product/)).toHaveLength(1);
               expect(mock.callsMatching(/nextval/)).toHaveLength(1);
               expect(mock.stock.quantity).toBe(2);
          });
     });
});
