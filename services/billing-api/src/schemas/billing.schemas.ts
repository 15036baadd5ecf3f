import {
     errorResponses,
     productKeyProperties,
     productSchema,
} from '@stockbill/shared/src/http/schemas';
import { REPORT_PERIODS } from '@stockbill/shared/src/services/report-service';

const totalsProperties = {
     subtotal: { type: 'number', example: 1500 },
     cgstRate: { type: 'number', example: 9 },
     sgstRate: { type: 'number', example: 9 },
     cgst: { type: 'number', example: 135 },
     sgst: { type: 'number', example: 135 },
     total: { type: 'number', example: 1770 },
};

const itemProperties = {
     lineNumber: { type: 'integer' },
     ...productKeyProperties,
     fullProductName: { type: 'string' },
     quantity: { type: 'integer' },
     unitPrice: { type: 'number' },
     lineTotal: { type: 'number' },
};

const customerSchema = {
     type: 'object',
     properties: {
          name: { type: 'string' },
          phone: { type: 'string' },
          address: { type: 'string' },
     },
};

const invoiceSummaryProperties = {
     id: { type: 'integer' },
     invoiceNumber: { type: 'integer', example: 42 },
     displayNumber: { type: 'string', example: 'INV-000042' },
     status: { type: 'string', enum: ['ISSUED', 'VOIDED'] },
     customer: customerSchema,
     ...totalsProperties,
     createdAt: { type: 'string', format: 'date-time' },
     voidedAt: { type: 'string', format: 'date-time' },
     voidReason: { type: 'string' },
};

export const invoiceSchema = {
     type: 'object',
     properties: {
          ...invoiceSummaryProperties,
          items: {
               type: 'array',
               items: {
                    type: 'object',
                    properties: { ...itemProperties, productId: { type: 'integer' } },
               },
          },
     },
};

// Quantities are checked by the invoice service so that a bad line reports INVALID_QUANTITY
const lineRequestSchema = {
     type: 'object',
     required: ['productName', 'quantity'],
     properties: {
          productName: { type: 'string', description: 'Product name', example: 'Rice' },
          weight: { type: 'string', description: 'Size or weight variant', example: '5kg' },
          quantity: { type: 'number', description: 'Units to sell', example: 10 },
     },
};

const linesSchema = {
     type: 'array',
     description: 'Invoice lines in display order',
     items: lineRequestSchema,
};

export const createInvoiceSchema = {
     tags: ['invoices'],
     summary: 'Create an invoice',
     description:
          'Validates lines against sellable stock, computes CGST/SGST, decrements stock and assigns the next invoice number in one transaction. Nothing is changed when any line fails.',
     body: {
          type: 'object',
          required: ['customer', 'lines'],
          properties: {
               customer: {
                    type: 'object',
                    required: ['name'],
                    properties: {
                         name: { type: 'string', example: 'Asha Traders' },
                         phone: { type: 'string', example: '9876543210' },
                         address: { type: 'string' },
                    },
               },
               lines: linesSchema,
          },
     },
     response: {
          201: { description: 'Invoice committed', ...invoiceSchema },
          ...errorResponses,
     },
};

export const quoteInvoiceSchema = {
     tags: ['invoices'],
     summary: 'Price invoice lines without committing',
     body: {
          type: 'object',
          required: ['lines'],
          properties: { lines: linesSchema },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    ...totalsProperties,
                    items: { type: 'array', items: { type: 'object', properties: itemProperties } },
               },
          },
          ...errorResponses,
     },
};

const invoiceNumberParams = {
     type: 'object',
     required: ['invoiceNumber'],
     properties: {
          invoiceNumber: { type: 'integer', minimum: 1 },
     },
};

export const getInvoiceSchema = {
     tags: ['invoices'],
     summary: 'Get an invoice by number',
     params: invoiceNumberParams,
     response: {
          200: invoiceSchema,
          ...errorResponses,
     },
};

export const listInvoicesSchema = {
     tags: ['invoices'],
     summary: 'List invoices, newest first',
     querystring: {
          type: 'object',
          properties: {
               limit: { type: 'integer', minimum: 1, maximum: 100, default: 20 },
               offset: { type: 'integer', minimum: 0, default: 0 },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    invoices: {
                         type: 'array',
                         items: { type: 'object', properties: invoiceSummaryProperties },
                    },
               },
          },
          ...errorResponses,
     },
};

export const voidInvoiceSchema = {
     tags: ['invoices'],
     summary: 'Void an invoice and return its stock',
     params: invoiceNumberParams,
     body: {
          type: 'object',
          required: ['reason'],
          properties: {
               reason: { type: 'string', minLength: 1, example: 'Customer returned goods' },
          },
     },
     response: {
          200: invoiceSchema,
          ...errorResponses,
     },
};

export const listProductsSchema = {
     tags: ['products'],
     summary: 'List the catalog',
     response: {
          200: {
               type: 'object',
               properties: {
                    products: { type: 'array', items: productSchema },
               },
          },
          ...errorResponses,
     },
};

const productKeyQuery = {
     type: 'object',
     required: ['name'],
     properties: {
          name: { type: 'string', minLength: 1 },
          weight: { type: 'string', default: '' },
     },
};

export const lookupProductSchema = {
     tags: ['products'],
     summary: 'Look up one product by name and weight',
     querystring: productKeyQuery,
     response: {
          200: productSchema,
          ...errorResponses,
     },
};

export const productHistorySchema = {
     tags: ['products'],
     summary: 'Stock movements for one product, newest first',
     querystring: {
          ...productKeyQuery,
          properties: {
               ...productKeyQuery.properties,
               limit: { type: 'integer', minimum: 1, maximum: 500, default: 50 },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    movements: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   id: { type: 'integer' },
                                   productId: { type: 'integer' },
                                   type: { type: 'string' },
                                   quantityDelta: { type: 'integer' },
                                   damagedDelta: { type: 'integer' },
                                   referenceId: { type: 'string' },
                                   metadata: { type: 'object', additionalProperties: true },
                                   createdAt: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          ...errorResponses,
     },
};

const periodParams = {
     type: 'object',
     required: ['period'],
     properties: {
          period: { type: 'string', enum: [...REPORT_PERIODS] },
     },
};

const productGroupProperties = {
     ...productKeyProperties,
     fullProductName: { type: 'string' },
};

export const summaryReportSchema = {
     tags: ['reports'],
     summary: 'Headline figures for a period',
     params: periodParams,
     response: {
          200: {
               type: 'object',
               properties: {
                    period: { type: 'string' },
                    totalInvoices: { type: 'integer' },
                    totalRevenue: { type: 'number' },
                    totalProfit: { type: 'number' },
                    totalProductsSold: { type: 'integer' },
                    uniqueCustomers: { type: 'integer' },
                    totalDamagedUnits: { type: 'integer' },
                    damagedValue: { type: 'number' },
               },
          },
          ...errorResponses,
     },
};

function rowsResponse(properties: Record<string, unknown>) {
     return {
          200: {
               type: 'object',
               properties: {
                    period: { type: 'string' },
                    rows: { type: 'array', items: { type: 'object', properties } },
               },
          },
          ...errorResponses,
     };
}

export const salesReportSchema = {
     tags: ['reports'],
     summary: 'Units and revenue per product',
     params: periodParams,
     response: rowsResponse({
          ...productGroupProperties,
          totalQuantity: { type: 'integer' },
          totalRevenue: { type: 'number' },
          timesSold: { type: 'integer' },
          averagePrice: { type: 'number' },
     }),
};

export const profitReportSchema = {
     tags: ['reports'],
     summary: 'Revenue, cost and profit per product',
     params: periodParams,
     response: rowsResponse({
          ...productGroupProperties,
          totalSold: { type: 'integer' },
          totalRevenue: { type: 'number' },
          totalCost: { type: 'number' },
          profit: { type: 'number' },
     }),
};

export const topProductsReportSchema = {
     tags: ['reports'],
     summary: 'Best selling products',
     params: periodParams,
     querystring: {
          type: 'object',
          properties: {
               limit: { type: 'integer', minimum: 1, maximum: 100, default: 10 },
          },
     },
     response: rowsResponse({
          ...productGroupProperties,
          totalSold: { type: 'integer' },
          totalRevenue: { type: 'number' },
          timesOrdered: { type: 'integer' },
     }),
};

export const damagedReportSchema = {
     tags: ['reports'],
     summary: 'Products holding damaged stock',
     response: {
          200: {
               type: 'object',
               properties: {
                    rows: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   ...productGroupProperties,
                                   availableQuantity: { type: 'integer' },
                                   damagedQuantity: { type: 'integer' },
                                   costPrice: { type: 'number' },
                                   sellingPrice: { type: 'number' },
                                   valueLost: { type: 'number' },
                                   updatedAt: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          ...errorResponses,
     },
};
