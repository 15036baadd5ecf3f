import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import * as dotenv from 'dotenv';
import { registerInvoiceRoutes } from './routes/invoices';
import { registerProductRoutes } from './routes/products';
import { registerReportRoutes } from './routes/reports';
import { registerApiKeyGuard } from '@stockbill/shared/src/http/api-key';
import { registerHealthRoutes } from '@stockbill/shared/src/http/health';
import { buildServerOptions } from '@stockbill/shared/src/http/server-options';
import { requireEnv } from '@stockbill/shared/src/utils/config';
import { logger } from '@stockbill/shared/src/utils/logger';

dotenv.config();

const PORT = parseInt(process.env.BILLING_API_PORT || '3000', 10);
const HOST = process.env.BILLING_API_HOST || '0.0.0.0';

async function main() {
     const app = Fastify(buildServerOptions());

     await app.register(cors, {
          origin: true,
     });

     await app.register(swagger, {
          openapi: {
               info: {
                    title: 'Billing API',
                    description: 'Invoice creation with GST, product lookup and sales reports',
                    version: '1.0.0',
               },
               servers: [{ url: `http://localhost:${PORT}`, description: 'Development' }],
               tags: [
                    { name: 'invoices', description: 'Invoice creation, lookup and voiding' },
                    { name: 'products', description: 'Read-only catalog access' },
                    { name: 'reports', description: 'Sales, profit and damaged stock reports' },
                    { name: 'health', description: 'Health and readiness checks' },
               ],
               components: {
                    securitySchemes: {
                         apiKey: {
                              type: 'apiKey',
                              name: 'X-API-Key',
                              in: 'header',
                         },
                    },
               },
               security: [{ apiKey: [] }],
          },
     });

     await app.register(swaggerUi, {
          routePrefix: '/docs',
          uiConfig: {
               docExpansion: 'list',
               deepLinking: true,
          },
     });

     registerApiKeyGuard(app, { header: 'x-api-key', apiKey: requireEnv('BILLING_API_KEY') });

     await app.register(registerHealthRoutes);
     await app.register(registerInvoiceRoutes, { prefix: '/invoices' });
     await app.register(registerProductRoutes, { prefix: '/products' });
     await app.register(registerReportRoutes, { prefix: '/reports' });

     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Billing API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((err) => {
     logger.fatal({ err }, 'Billing API failed to start');
     process.exit(1);
});
