import { FastifyInstance } from 'fastify';
import { withTransactionRetry } from '@stockbill/shared/src/db/client';
import { routeErrorHandler, sendRouteError } from '@stockbill/shared/src/http/errors';
import { ProductCatalog } from '@stockbill/shared/src/services/product-catalog';
import type {
     NewProduct,
     ProductKey,
     ProductUpdate,
} from '@stockbill/shared/src/types/billing.types';
import { loadBillingConfig } from '@stockbill/shared/src/utils/config';
import {
     addProductSchema,
     removeProductSchema,
     updateProductSchema,
} from '../schemas/admin.schemas';

export async function registerProductAdminRoutes(app: FastifyInstance) {
     const { transactionRetries } = loadBillingConfig();
     const catalog = new ProductCatalog();

     app.setErrorHandler(routeErrorHandler);

     app.post<{ Body: NewProduct }>(
          '/',
          { schema: addProductSchema },
          async (request, reply) => {
               try {
                    const product = await withTransactionRetry(
                         (client) => catalog.add(client, request.body),
                         transactionRetries
                    );
                    return reply.code(201).send(product);
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to add product');
               }
          }
     );

     app.patch<{ Body: ProductKey & ProductUpdate }>(
          '/',
          { schema: updateProductSchema },
          async (request, reply) => {
               const { productName, weight, ...fields } = request.body;
               try {
                    const product = await withTransactionRetry(
                         (client) => catalog.update(client, { productName, weight }, fields),
                         transactionRetries
                    );
                    return reply.send(product);
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to update product');
               }
          }
     );

     app.delete<{ Querystring: { name: string; weight?: string } }>(
          '/',
          { schema: removeProductSchema },
          async (request, reply) => {
               const key = { productName: request.query.name, weight: request.query.weight ?? '' };
               try {
                    await withTransactionRetry(
                         (client) => catalog.remove(client, key),
                         transactionRetries
                    );
                    request.log.info({ key }, 'Product removed');
                    return reply.code(204).send();
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to remove product');
               }
          }
     );
}
