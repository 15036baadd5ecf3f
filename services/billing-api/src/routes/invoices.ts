import { FastifyInstance } from 'fastify';
import {
     withConnection,
     withTransactionRetry,
} from '@stockbill/shared/src/db/client';
import { routeErrorHandler, sendRouteError } from '@stockbill/shared/src/http/errors';
import { InvoiceService } from '@stockbill/shared/src/services/invoice-service';
import type {
     CreateInvoiceRequest,
     InvoiceLineRequest,
} from '@stockbill/shared/src/types/billing.types';
import { loadBillingConfig } from '@stockbill/shared/src/utils/config';
import {
     createInvoiceSchema,
     getInvoiceSchema,
     listInvoicesSchema,
     quoteInvoiceSchema,
     voidInvoiceSchema,
} from '../schemas/billing.schemas';

export async function registerInvoiceRoutes(app: FastifyInstance) {
     const config = loadBillingConfig();
     const invoiceService = new InvoiceService(config);

     app.setErrorHandler(routeErrorHandler);

     // Create and commit an invoice
     app.post<{ Body: CreateInvoiceRequest }>(
          '/',
          { schema: createInvoiceSchema },
          async (request, reply) => {
               try {
                    const invoice = await withTransactionRetry(
                         (client) => invoiceService.createInvoice(client, request.body),
                         config.transactionRetries
                    );

                    request.log.info(
                         { invoiceNumber: invoice.invoiceNumber, total: invoice.total },
                         'Invoice committed'
                    );

                    return reply.code(201).send(invoice);
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to create invoice');
               }
          }
     );

     // Price lines against current stock without committing
     app.post<{ Body: { lines: InvoiceLineRequest[] } }>(
          '/quote',
          { schema: quoteInvoiceSchema },
          async (request, reply) => {
               try {
                    const quote = await withConnection((client) =>
                         invoiceService.quoteInvoice(client, request.body.lines)
                    );
                    return reply.send(quote);
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to quote invoice');
               }
          }
     );

     app.get<{ Querystring: { limit?: number; offset?: number } }>(
          '/',
          { schema: listInvoicesSchema },
          async (request, reply) => {
               try {
                    const invoices = await withConnection((client) =>
                         invoiceService.listInvoices(client, request.query)
                    );
                    return reply.send({ invoices });
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to list invoices');
               }
          }
     );

     app.get<{ Params: { invoiceNumber: number } }>(
          '/:invoiceNumber',
          { schema: getInvoiceSchema },
          async (request, reply) => {
               try {
                    const invoice = await withConnection((client) =>
                         invoiceService.getInvoice(client, request.params.invoiceNumber)
                    );
                    return reply.send(invoice);
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to get invoice');
               }
          }
     );

     app.post<{ Params: { invoiceNumber: number }; Body: { reason: string } }>(
          '/:invoiceNumber/void',
          { schema: voidInvoiceSchema },
          async (request, reply) => {
               try {
                    const invoice = await withTransactionRetry(
                         (client) =>
                              invoiceService.voidInvoice(
                                   client,
                                   request.params.invoiceNumber,
                                   request.body.reason
                              ),
                         config.transactionRetries
                    );
                    return reply.send(invoice);
               } catch (error) {
                    return sendRouteError(request, reply, error, 'Failed to void invoice');
               }
          }
     );
}
