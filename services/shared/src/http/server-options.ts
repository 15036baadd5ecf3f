import type { FastifyServerOptions } from 'fastify';

// Body coercion and stripping shared by every service and its tests
export const AJV_OPTIONS = {
     customOptions: {
          removeAdditional: 'all' as const,
          coerceTypes: true,
          useDefaults: true,
          strict: false,
     },
};

export function buildServerOptions(): FastifyServerOptions {
     return {
          logger: {
               level: process.env.LOG_LEVEL || 'info',
               redact: ['req.headers["x-api-key"]', 'req.headers["x-admin-api-key"]'],
          },
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const header = req.headers['x-correlation-id'];
               return typeof header === 'string' && header ? header : `req-${Date.now()}`;
          },
          ajv: AJV_OPTIONS,
     };
}
