import dotenv from 'dotenv';
import { closePool } from '@stockbill/shared/src/db/client';
import { closeConnection } from '@stockbill/shared/src/messaging/client';
import { logger } from '@stockbill/shared/src/utils/logger';
import { EventDispatcher } from './dispatcher';

dotenv.config();

async function main() {
     const dispatcher = new EventDispatcher();

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          dispatcher.stop();
          await closeConnection();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     await dispatcher.start();
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in event dispatcher');
     process.exit(1);
});
