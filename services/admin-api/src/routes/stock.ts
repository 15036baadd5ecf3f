import { FastifyInstance } from 'fastify';
import { withTransactionRetry } from '@stockbill/shared/src/db/client';
import { routeErrorHandler, sendRouteError } from '@stockbill/shared/src/http/errors';
import { DamagedStockLedger } from '@stockbill/shared/src/services/damaged-stock-ledger';
import { loadBillingConfig } from '@stockbill/shared/src/utils/config';
import { markDamagedSchema, restoreDamagedSchema } from '../schemas/admin.schemas';

interface DamageBody {
     productName: string;
     weight: string;
     quantity: number;
     reason?: string;
}

export async function registerStockAdminRoutes(app: FastifyInstance) {
     const { transactionRetries } = loadBillingConfig();
     const ledger = new DamagedStockLedger();

     app.setErrorHandler(routeErrorHandler);

     app.post<{ Body: DamageBody }>(
          '/damaged',
          { schema: markDamagedSchema },
          async (request, reply) => {
               const { productName, weight, quantity, reason } = request.body;
               try {
                    const result = await withTransactionRetry(
                         (client) =>
                              ledger.markDamaged(client, { productName, weight }, quantity, reason),
                         transactionRetries
                    );
                    return reply.send(result);
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to mark stock damaged');
               }
          }
     );

     app.post<{ Body: DamageBody }>(
          '/restore',
          { schema: restoreDamagedSchema },
          async (request, reply) => {
               const { productName, weight, quantity, reason } = request.body;
               try {
                    const result = await withTransactionRetry(
                         (client) => ledger.restore(client, { productName, weight }, quantity, reason),
                         transactionRetries
                    );
                    return reply.send(result);
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to restore damaged stock');
               }
          }
     );
}
