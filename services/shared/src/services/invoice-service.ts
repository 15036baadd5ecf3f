import { PoolClient } from 'pg';
import {
     CreateInvoiceRequest,
     Customer,
     Invoice,
     InvoiceItem,
     InvoiceLineRequest,
     InvoiceQuote,
     InvoiceStage,
     InvoiceStatus,
     InvoiceSummary,
     Product,
     ProductKey,
} from '../types/billing.types';
import { BillingConfig, loadBillingConfig } from '../utils/config';
import {
     DomainError,
     EmptyInvoiceError,
     InsufficientStockError,
     InvalidCustomerError,
     InvalidQuantityError,
     InvoiceAlreadyVoidedError,
     InvoiceNotFoundError,
     ProductNotFoundError,
     UnknownProductError,
     ValidationError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { formatMinorUnits, fromMinorUnits, toMinorUnits } from '../utils/money';
import { fullProductName, normalizeProductKey, productKeyId } from '../utils/product-key';
import { enqueueDomainEvent } from './domain-events';
import { PricedInvoice, PricingLine, priceInvoice } from './invoice-calculator';
import { formatInvoiceNumber, InvoiceSequencer } from './invoice-sequencer';
import { ProductCatalog } from './product-catalog';
import { recordStockMovement } from './stock-movements';

interface NormalizedLine {
     key: ProductKey;
     quantity: number;
}

interface InvoiceRow {
     id: string;
     invoice_number: string;
     status: InvoiceStatus;
     customer_name: string;
     customer_phone: string | null;
     customer_address: string | null;
     subtotal: string;
     cgst_rate: string;
     sgst_rate: string;
     cgst_amount: string;
     sgst_amount: string;
     total_amount: string;
     created_at: Date;
     voided_at: Date | null;
     void_reason: string | null;
}

interface InvoiceItemRow {
     line_number: number;
     product_id: string;
     product_name: string;
     weight: string;
     quantity: number;
     unit_price: string;
     line_total: string;
}

const INVOICE_COLUMNS = `
        id,
        invoice_number,
        status,
        customer_name,
        customer_phone,
        customer_address,
        subtotal,
        cgst_rate,
        sgst_rate,
        cgst_amount,
        sgst_amount,
        total_amount,
        created_at,
        voided_at,
        void_reason`;

export interface ListInvoicesOptions {
     limit?: number;
     offset?: number;
}

function validateCustomer(customer: Customer | undefined): Customer {
     const name = customer?.name?.trim() ?? '';
     if (!name) {
          throw new InvalidCustomerError('Customer name is required');
     }

     const phone = customer?.phone?.trim() || undefined;
     if (phone && !/^\d+$/.test(phone)) {
          throw new InvalidCustomerError('Phone number should contain only digits');
     }

     return {
          name,
          phone,
          address: customer?.address?.trim() || undefined,
     };
}

function validateLines(lines: InvoiceLineRequest[] | undefined): NormalizedLine[] {
     if (!lines || lines.length === 0) {
          throw new EmptyInvoiceError();
     }

     return lines.map((line, index) => {
          const key = normalizeProductKey(line);
          if (!key.productName) {
               throw new ValidationError(`Line ${index + 1}: product name is required`);
          }
          if (!Number.isInteger(line.quantity) || line.quantity <= 0) {
               throw new InvalidQuantityError(
                    `Line ${index + 1}: quantity must be a positive integer for ${fullProductName(key)}`
               );
          }
          return { key, quantity: line.quantity };
     });
}

export class InvoiceService {
     constructor(
          private readonly config: BillingConfig = loadBillingConfig(),
          private readonly catalog: ProductCatalog = new ProductCatalog(),
          private readonly sequencer: InvoiceSequencer = new InvoiceSequencer()
     ) {}

     /**
      * Creates an invoice all-or-nothing: locks the requested products, checks
      * sellable stock, prices the lines, decrements stock, takes the next invoice
      * number and persists header, items, stock movements and the outbox event.
      * Must run on a transaction client; any error leaves the caller to roll
      * back, and the only trace it leaves is a skipped invoice number.
      */
     async createInvoice(client: PoolClient, request: CreateInvoiceRequest): Promise<Invoice> {
          let stage: InvoiceStage = 'VALIDATING';

          try {
               const customer = validateCustomer(request.customer);
               const lines = validateLines(request.lines);

               logger.info(
                    { customer: customer.name, lineCount: lines.length },
                    'Creating invoice'
               );

               const products = await this.catalog.lockForUpdate(
                    client,
                    lines.map((l) => l.key)
               );
               const resolved = this.resolveLines(lines, products);

               stage = 'PRICING';
               const priced = priceInvoice(resolved, this.config.gstRatePercent);

               stage = 'RESERVING';
               const requested = this.requestedByProduct(resolved);
               for (const { product, quantity } of requested) {
                    await this.catalog.reserve(client, product, quantity);
               }

               stage = 'NUMBERING';
               const invoiceNumber = await this.sequencer.next(client);

               stage = 'PERSISTING';
               const invoice = await this.persist(client, invoiceNumber, customer, priced);

               for (const { product, quantity } of requested) {
                    await recordStockMovement(client, {
                         productId: product.id,
                         type: 'INVOICE_SALE',
                         quantityDelta: -quantity,
                         referenceId: invoice.displayNumber,
                    });
               }

               await enqueueDomainEvent(client, 'InvoiceCreated', {
                    invoiceNumber,
                    customerName: customer.name,
                    total: invoice.total,
                    lines: invoice.items.map((item) => ({
                         productId: item.productId,
                         quantity: item.quantity,
                         unitPrice: item.unitPrice,
                    })),
                    timestamp: invoice.createdAt.toISOString(),
               });

               stage = 'COMMITTED';
               logger.info(
                    { invoiceNumber, total: invoice.total, itemCount: invoice.items.length },
                    'Invoice created'
               );

               return invoice;
          } catch (error) {
               if (error instanceof DomainError) {
                    logger.info({ stage, code: error.code }, 'Invoice rejected');
               } else {
                    logger.error({ stage, err: error }, 'Invoice creation failed');
               }
               throw error;
          }
     }

     /**
      * Validates and prices lines against current stock and prices without
      * locking or writing anything.
      */
     async quoteInvoice(client: PoolClient, lineRequests: InvoiceLineRequest[]): Promise<InvoiceQuote> {
          const lines = validateLines(lineRequests);
          const products = await this.catalog.findMany(
               client,
               lines.map((l) => l.key)
          );
          const resolved = this.resolveLines(lines, products);
          const priced = priceInvoice(resolved, this.config.gstRatePercent);

          return {
               ...priced.totals,
               items: priced.lines.map((line, index) => ({
                    lineNumber: index + 1,
                    productName: line.product.productName,
                    weight: line.product.weight,
                    fullProductName: line.product.fullProductName,
                    quantity: line.quantity,
                    unitPrice: fromMinorUnits(line.unitPriceMinor),
                    lineTotal: fromMinorUnits(line.lineTotalMinor),
               })),
          };
     }

     async getInvoice(client: PoolClient, invoiceNumber: number): Promise<Invoice> {
          const { rows } = await client.query<InvoiceRow>(
               `
      SELECT ${INVOICE_COLUMNS}
      FROM invoice
      WHERE invoice_number = $1
    `,
               [invoiceNumber]
          );

          if (rows.length === 0) {
               throw new InvoiceNotFoundError(invoiceNumber);
          }

          const header = this.mapInvoiceRow(rows[0]);
          const items = await this.loadItems(client, header.id);
          return { ...header, items };
     }

     async listInvoices(
          client: PoolClient,
          options: ListInvoicesOptions = {}
     ): Promise<InvoiceSummary[]> {
          const limit = Math.min(Math.max(options.limit ?? 20, 1), 100);
          const offset = Math.max(options.offset ?? 0, 0);

          const { rows } = await client.query<InvoiceRow>(
               `
      SELECT ${INVOICE_COLUMNS}
      FROM invoice
      ORDER BY invoice_number DESC
      LIMIT $1 OFFSET $2
    `,
               [limit, offset]
          );

          return rows.map((row) => this.mapInvoiceRow(row));
     }

     /**
      * Voids an issued invoice and returns its quantities to sellable stock.
      * The number and the frozen totals stay as they were.
      */
     async voidInvoice(client: PoolClient, invoiceNumber: number, reason: string): Promise<Invoice> {
          logger.info({ invoiceNumber, reason }, 'Voiding invoice');

          const { rows } = await client.query<InvoiceRow>(
               `
      SELECT ${INVOICE_COLUMNS}
      FROM invoice
      WHERE invoice_number = $1
      FOR UPDATE
    `,
               [invoiceNumber]
          );

          if (rows.length === 0) {
               throw new InvoiceNotFoundError(invoiceNumber);
          }

          const header = this.mapInvoiceRow(rows[0]);
          if (header.status === 'VOIDED') {
               throw new InvoiceAlreadyVoidedError(invoiceNumber);
          }

          const items = await this.loadItems(client, header.id);
          const products = await this.catalog.lockForUpdate(client, items);

          const returned = new Map<string, { product: Product; quantity: number }>();
          for (const item of items) {
               const id = productKeyId(item);
               const product = products.get(id);
               if (!product) {
                    throw new ProductNotFoundError(item.productName, item.weight);
               }
               const entry = returned.get(id) ?? { product, quantity: 0 };
               entry.quantity += item.quantity;
               returned.set(id, entry);
          }

          for (const { product, quantity } of returned.values()) {
               await this.catalog.release(client, product, quantity);
               await recordStockMovement(client, {
                    productId: product.id,
                    type: 'INVOICE_VOID',
                    quantityDelta: quantity,
                    referenceId: header.displayNumber,
                    metadata: { reason },
               });
          }

          const { rows: updated } = await client.query<InvoiceRow>(
               `
      UPDATE invoice
      SET status = 'VOIDED',
          voided_at = NOW(),
          void_reason = $2
      WHERE id = $1
      RETURNING ${INVOICE_COLUMNS}
    `,
               [header.id, reason]
          );

          await enqueueDomainEvent(client, 'InvoiceVoided', {
               invoiceNumber,
               reason,
               timestamp: new Date().toISOString(),
          });

          logger.info({ invoiceNumber, restoredProducts: returned.size }, 'Invoice voided');

          return { ...this.mapInvoiceRow(updated[0]), items };
     }

     private resolveLines(lines: NormalizedLine[], products: Map<string, Product>): PricingLine[] {
          const resolved = lines.map((line) => {
               const product = products.get(productKeyId(line.key));
               if (!product) {
                    throw new UnknownProductError(line.key.productName, line.key.weight);
               }
               return { product, quantity: line.quantity };
          });

          // Lines for the same product draw on the same stock
          for (const { product, quantity } of this.requestedByProduct(resolved)) {
               if (quantity > product.quantity) {
                    throw new InsufficientStockError(
                         product.productName,
                         product.weight,
                         quantity,
                         product.quantity
                    );
               }
          }

          return resolved;
     }

     /** Sums line quantities per product, in order of first appearance. */
     private requestedByProduct(lines: PricingLine[]): PricingLine[] {
          const totals = new Map<number, PricingLine>();
          for (const line of lines) {
               const entry = totals.get(line.product.id);
               if (entry) {
                    entry.quantity += line.quantity;
               } else {
                    totals.set(line.product.id, { product: line.product, quantity: line.quantity });
               }
          }
          return [...totals.values()];
     }

     private async persist(
          client: PoolClient,
          invoiceNumber: number,
          customer: Customer,
          priced: PricedInvoice
     ): Promise<Invoice> {
          const { totals } = priced;

          const { rows } = await client.query<InvoiceRow>(
               `
      INSERT INTO invoice (
        invoice_number,
        customer_name,
        customer_phone,
        customer_address,
        subtotal,
        cgst_rate,
        sgst_rate,
        cgst_amount,
        sgst_amount,
        total_amount
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      RETURNING ${INVOICE_COLUMNS}
    `,
               [
                    invoiceNumber,
                    customer.name,
                    customer.phone ?? null,
                    customer.address ?? null,
                    formatMinorUnits(priced.subtotalMinor),
                    totals.cgstRate,
                    totals.sgstRate,
                    formatMinorUnits(priced.cgstMinor),
                    formatMinorUnits(priced.sgstMinor),
                    formatMinorUnits(priced.totalMinor),
               ]
          );

          const header = this.mapInvoiceRow(rows[0]);
          const items: InvoiceItem[] = [];

          for (const [index, line] of priced.lines.entries()) {
               const item: InvoiceItem = {
                    lineNumber: index + 1,
                    productId: line.product.id,
                    productName: line.product.productName,
                    weight: line.product.weight,
                    fullProductName: line.product.fullProductName,
                    quantity: line.quantity,
                    unitPrice: fromMinorUnits(line.unitPriceMinor),
                    lineTotal: fromMinorUnits(line.lineTotalMinor),
               };

               await client.query(
                    `
        INSERT INTO invoice_item (
          invoice_id,
          line_number,
          product_id,
          product_name,
          weight,
          quantity,
          unit_price,
          line_total
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      `,
                    [
                         header.id,
                         item.lineNumber,
                         item.productId,
                         item.productName,
                         item.weight,
                         item.quantity,
                         formatMinorUnits(line.unitPriceMinor),
                         formatMinorUnits(line.lineTotalMinor),
                    ]
               );

               items.push(item);
          }

          return { ...header, items };
     }

     private async loadItems(client: PoolClient, invoiceId: number): Promise<InvoiceItem[]> {
          const { rows } = await client.query<InvoiceItemRow>(
               `
      SELECT line_number, product_id, product_name, weight, quantity, unit_price, line_total
      FROM invoice_item
      WHERE invoice_id = $1
      ORDER BY line_number
    `,
               [invoiceId]
          );

          return rows.map((row) => ({
               lineNumber: row.line_number,
               productId: parseInt(String(row.product_id), 10),
               productName: row.product_name,
               weight: row.weight,
               fullProductName: fullProductName({ productName: row.product_name, weight: row.weight }),
               quantity: row.quantity,
               unitPrice: fromMinorUnits(toMinorUnits(row.unit_price)),
               lineTotal: fromMinorUnits(toMinorUnits(row.line_total)),
          }));
     }

     private mapInvoiceRow(row: InvoiceRow): InvoiceSummary {
          const invoiceNumber = parseInt(String(row.invoice_number), 10);
          return {
               id: parseInt(String(row.id), 10),
               invoiceNumber,
               displayNumber: formatInvoiceNumber(
                    invoiceNumber,
                    this.config.invoiceNumberPrefix,
                    this.config.invoiceNumberPadding
               ),
               status: row.status,
               customer: {
                    name: row.customer_name,
                    phone: row.customer_phone || undefined,
                    address: row.customer_address || undefined,
               },
               subtotal: fromMinorUnits(toMinorUnits(row.subtotal)),
               cgstRate: Number(row.cgst_rate),
               sgstRate: Number(row.sgst_rate),
               cgst: fromMinorUnits(toMinorUnits(row.cgst_amount)),
               sgst: fromMinorUnits(toMinorUnits(row.sgst_amount)),
               total: fromMinorUnits(toMinorUnits(row.total_amount)),
               createdAt: row.created_at,
               voidedAt: row.voided_at || undefined,
               voidReason: row.void_reason || undefined,
          };
     }
}
