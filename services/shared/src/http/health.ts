import type { FastifyInstance } from 'fastify';
import { checkConnection } from '../db/client';

export async function registerHealthRoutes(app: FastifyInstance): Promise<void> {
     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => ({
               status: 'ok',
               timestamp: new Date().toISOString(),
          })
     );

     app.get(
          '/health/ready',
          {
               schema: {
                    tags: ['health'],
                    description: 'Readiness check with database validation',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: {
                                        type: 'object',
                                        properties: {
                                             database: { type: 'string' },
                                        },
                                   },
                              },
                         },
                         503: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string' },
                                   error: { type: 'string' },
                              },
                         },
                    },
               },
          },
          async (_request, reply) => {
               // checkConnection logs and returns false rather than throwing
               const dbHealthy = await checkConnection();
               if (!dbHealthy) {
                    reply.code(503);
                    return {
                         status: 'not_ready',
                         error: 'Database connection failed',
                    };
               }

               return {
                    status: 'ready',
                    dependencies: {
                         database: 'ok',
                    },
               };
          }
     );
}
