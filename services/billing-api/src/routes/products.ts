import { FastifyInstance } from 'fastify';
import { withConnection } from '@stockbill/shared/src/db/client';
import { routeErrorHandler, sendRouteError } from '@stockbill/shared/src/http/errors';
import { ProductCatalog } from '@stockbill/shared/src/services/product-catalog';
import {
     listProductsSchema,
     lookupProductSchema,
     productHistorySchema,
} from '../schemas/billing.schemas';

interface ProductKeyQuery {
     name: string;
     weight?: string;
}

const catalog = new ProductCatalog();

export async function registerProductRoutes(app: FastifyInstance) {
     app.setErrorHandler(routeErrorHandler);

     app.get('/', { schema: listProductsSchema }, async (request, reply) => {
          try {
               const products = await withConnection((client) => catalog.list(client));
               return reply.send({ products });
          } catch (error) {
               return sendRouteError(request, reply, error, 'Failed to list products');
          }
     });

     app.get<{ Querystring: ProductKeyQuery }>(
          '/lookup',
          { schema: lookupProductSchema },
          async (request, reply) => {
               const key = { productName: request.query.name, weight: request.query.weight ?? '' };
               try {
                    const product = await withConnection((client) => catalog.require(client, key));
                    return reply.send(product);
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to look up product');
               }
          }
     );

     app.get<{ Querystring: ProductKeyQuery & { limit?: number } }>(
          '/history',
          { schema: productHistorySchema },
          async (request, reply) => {
               const key = { productName: request.query.name, weight: request.query.weight ?? '' };
               try {
                    const movements = await withConnection((client) =>
                         catalog.history(client, key, request.query.limit)
                    );
                    return reply.send({ movements });
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to load stock history');
               }
          }
     );
}
