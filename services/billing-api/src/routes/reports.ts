import { FastifyInstance } from 'fastify';
import { withConnection } from '@stockbill/shared/src/db/client';
import { routeErrorHandler, sendRouteError } from '@stockbill/shared/src/http/errors';
import { parseReportPeriod, ReportService } from '@stockbill/shared/src/services/report-service';
import {
     damagedReportSchema,
     profitReportSchema,
     salesReportSchema,
     summaryReportSchema,
     topProductsReportSchema,
} from '../schemas/billing.schemas';

interface PeriodParams {
     period: string;
}

const reportService = new ReportService();

export async function registerReportRoutes(app: FastifyInstance) {
     app.setErrorHandler(routeErrorHandler);

     app.get<{ Params: PeriodParams }>(
          '/summary/:period',
          { schema: summaryReportSchema },
          async (request, reply) => {
               try {
                    const period = parseReportPeriod(request.params.period);
                    const summary = await withConnection((client) =>
                         reportService.getSummary(client, period)
                    );
                    return reply.send(summary);
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to build summary report');
               }
          }
     );

     app.get<{ Params: PeriodParams }>(
          '/sales/:period',
          { schema: salesReportSchema },
          async (request, reply) => {
               try {
                    const period = parseReportPeriod(request.params.period);
                    const rows = await withConnection((client) =>
                         reportService.getSalesByProduct(client, period)
                    );
                    return reply.send({ period, rows });
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to build sales report');
               }
          }
     );

     app.get<{ Params: PeriodParams }>(
          '/profit/:period',
          { schema: profitReportSchema },
          async (request, reply) => {
               try {
                    const period = parseReportPeriod(request.params.period);
                    const rows = await withConnection((client) =>
                         reportService.getProfitByProduct(client, period)
                    );
                    return reply.send({ period, rows });
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to build profit report');
               }
          }
     );

     app.get<{ Params: PeriodParams; Querystring: { limit?: number } }>(
          '/top-products/:period',
          { schema: topProductsReportSchema },
          async (request, reply) => {
               try {
                    const period = parseReportPeriod(request.params.period);
                    const rows = await withConnection((client) =>
                         reportService.getTopProducts(client, period, request.query.limit)
                    );
                    return reply.send({ period, rows });
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to build top products report');
               }
          }
     );

     app.get('/damaged', { schema: damagedReportSchema }, async (request, reply) => {
          try {
               const rows = await withConnection((client) => reportService.getDamagedStock(client));
               return reply.send({ rows });
          } catch (error) {
               return sendRouteError(request, reply, error, 'Failed to build damaged stock report');
          }
     });
}
