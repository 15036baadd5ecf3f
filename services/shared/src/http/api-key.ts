import { timingSafeEqual } from 'node:crypto';
import type { FastifyInstance } from 'fastify';

export interface ApiKeyGuardOptions {
     /** Lower-case header name, e.g. x-api-key */
     header: string;
     apiKey: string;
     /** Paths starting with any of these skip the check */
     publicPrefixes?: string[];
}

function keysMatch(provided: string, expected: string): boolean {
     const a = Buffer.from(provided);
     const b = Buffer.from(expected);
     return a.length === b.length && timingSafeEqual(a, b);
}

export function registerApiKeyGuard(app: FastifyInstance, options: ApiKeyGuardOptions): void {
     const publicPrefixes = options.publicPrefixes ?? ['/health', '/docs'];

     app.addHook('onRequest', async (request, reply) => {
          if (publicPrefixes.some((prefix) => request.url.startsWith(prefix))) {
               return;
          }

          const provided = request.headers[options.header];
          if (typeof provided !== 'string' || !keysMatch(provided, options.apiKey)) {
               request.log.warn({ url: request.url }, 'Rejected request without a valid API key');
               return reply.code(401).send({
                    error: 'UNAUTHORIZED',
                    message: 'Missing or invalid API key',
               });
          }
     });
}
