import { errorResponseSchema } from './errors';

// Response schemas shared by billing-api and admin-api. fast-json-stringify
// drops any property not listed here.

export const errorResponses = {
     400: { description: 'Invalid request', ...errorResponseSchema },
     404: { description: 'Not found', ...errorResponseSchema },
     409: { description: 'Stock or state conflict', ...errorResponseSchema },
     500: { description: 'Internal server error', ...errorResponseSchema },
     503: { description: 'Store unavailable, nothing was committed', ...errorResponseSchema },
};

export const productKeyProperties = {
     productName: { type: 'string', example: 'Rice' },
     weight: { type: 'string', example: '5kg' },
};

export const productSchema = {
     type: 'object',
     properties: {
          id: { type: 'integer' },
          ...productKeyProperties,
          fullProductName: { type: 'string', example: 'Rice (5kg)' },
          quantity: { type: 'integer' },
          damagedQuantity: { type: 'integer' },
          costPrice: { type: 'number' },
          sellingPrice: { type: 'number' },
          createdAt: { type: 'string', format: 'date-time' },
          updatedAt: { type: 'string', format: 'date-time' },
     },
};
