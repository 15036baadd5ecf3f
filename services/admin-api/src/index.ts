import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import * as dotenv from 'dotenv';
import { registerProductAdminRoutes } from './routes/products';
import { registerStockAdminRoutes } from './routes/stock';
import { registerApiKeyGuard } from '@stockbill/shared/src/http/api-key';
import { registerHealthRoutes } from '@stockbill/shared/src/http/health';
import { buildServerOptions } from '@stockbill/shared/src/http/server-options';
import { requireEnv } from '@stockbill/shared/src/utils/config';
import { logger } from '@stockbill/shared/src/utils/logger';

dotenv.config();

const PORT = parseInt(process.env.ADMIN_API_PORT || '3100', 10);
const HOST = process.env.ADMIN_API_HOST || '0.0.0.0';

async function main() {
     const app = Fastify(buildServerOptions());

     await app.register(cors, {
          origin: true,
     });

     await app.register(swagger, {
          openapi: {
               info: {
                    title: 'Billing Admin API',
                    description: 'Catalog administration and damaged stock operations',
                    version: '1.0.0',
               },
               servers: [{ url: `http://localhost:${PORT}`, description: 'Development' }],
               tags: [
                    { name: 'products-admin', description: 'Add, correct and remove products' },
                    { name: 'stock-admin', description: 'Damaged stock marking and restore' },
                    { name: 'health', description: 'Health and readiness checks' },
               ],
               components: {
                    securitySchemes: {
                         adminApiKey: {
                              type: 'apiKey',
                              name: 'X-Admin-API-Key',
                              in: 'header',
                              description: 'Admin API key for authenticated operations',
                         },
                    },
               },
               security: [{ adminApiKey: [] }],
          },
     });

     await app.register(swaggerUi, {
          routePrefix: '/docs',
          uiConfig: {
               docExpansion: 'list',
               deepLinking: true,
          },
     });

     registerApiKeyGuard(app, {
          header: 'x-admin-api-key',
          apiKey: requireEnv('ADMIN_API_KEY'),
     });

     await app.register(registerHealthRoutes);
     await app.register(registerProductAdminRoutes, { prefix: '/admin/products' });
     await app.register(registerStockAdminRoutes, { prefix: '/admin/stock' });

     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Admin API listening on ${HOST}:${PORT}`);
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
     logger.fatal({ err }, 'Admin API failed to start');
     process.exit(1);
});
