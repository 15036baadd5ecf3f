import { errorResponses, productSchema } from '@stockbill/shared/src/http/schemas';
import { MAX_STOCK_QUANTITY } from '@stockbill/shared/src/services/product-catalog';
import { MAX_PRICE } from '@stockbill/shared/src/utils/money';

const productKeyBody = {
     productName: {
          type: 'string',
          description: 'Product name',
          example: 'Rice',
     },
     weight: {
          type: 'string',
          description: 'Size or weight variant, empty when the product has none',
          example: '5kg',
          default: '',
     },
};

export const addProductSchema = {
     tags: ['products-admin'],
     summary: 'Add a product',
     description: 'Creates a product variant. Fails with DUPLICATE_PRODUCT when the name and weight already exist.',
     security: [{ adminApiKey: [] }],
     body: {
          type: 'object',
          required: ['productName', 'quantity', 'sellingPrice'],
          properties: {
               ...productKeyBody,
               quantity: {
                    type: 'number',
                    maximum: MAX_STOCK_QUANTITY,
                    description: 'Opening sellable stock',
                    example: 100,
               },
               costPrice: { type: 'number', maximum: MAX_PRICE, default: 0, example: 250 },
               sellingPrice: { type: 'number', maximum: MAX_PRICE, example: 300 },
          },
     },
     response: {
          201: { description: 'Product created', ...productSchema },
          ...errorResponses,
     },
};

export const updateProductSchema = {
     tags: ['products-admin'],
     summary: 'Correct stock or prices',
     description: 'Administrative correction. A stock change is recorded as an ADJUSTMENT movement.',
     security: [{ adminApiKey: [] }],
     body: {
          type: 'object',
          required: ['productName'],
          properties: {
               ...productKeyBody,
               quantity: { type: 'number', maximum: MAX_STOCK_QUANTITY, example: 80 },
               costPrice: { type: 'number', maximum: MAX_PRICE, example: 260 },
               sellingPrice: { type: 'number', maximum: MAX_PRICE, example: 320 },
          },
     },
     response: {
          200: productSchema,
          ...errorResponses,
     },
};

export const removeProductSchema = {
     tags: ['products-admin'],
     summary: 'Remove a product that no invoice refers to',
     security: [{ adminApiKey: [] }],
     querystring: {
          type: 'object',
          required: ['name'],
          properties: {
               name: { type: 'string', minLength: 1 },
               weight: { type: 'string', default: '' },
          },
     },
     response: {
          204: { description: 'Product removed', type: 'null' },
          ...errorResponses,
     },
};

const damageBody = {
     type: 'object',
     required: ['productName', 'quantity'],
     properties: {
          ...productKeyBody,
          quantity: { type: 'number', maximum: MAX_STOCK_QUANTITY, example: 2 },
          reason: { type: 'string', example: 'Torn packaging' },
     },
};

const damageResponse = {
     type: 'object',
     properties: {
          product: productSchema,
          quantity: { type: 'integer' },
     },
};

export const markDamagedSchema = {
     tags: ['stock-admin'],
     summary: 'Move sellable units to damaged',
     security: [{ adminApiKey: [] }],
     body: damageBody,
     response: {
          200: damageResponse,
          ...errorResponses,
     },
};

export const restoreDamagedSchema = {
     tags: ['stock-admin'],
     summary: 'Return damaged units to sellable stock',
     security: [{ adminApiKey: [] }],
     body: damageBody,
     response: {
          200: damageResponse,
          ...errorResponses,
     },
};
