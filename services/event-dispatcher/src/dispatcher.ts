import type { Channel } from 'amqplib';
import { withTransaction } from '@stockbill/shared/src/db/client';
import {
     BILLING_EVENTS_EXCHANGE,
     getChannel,
     routingKeyFor,
} from '@stockbill/shared/src/messaging/client';
import { createChildLogger } from '@stockbill/shared/src/utils/logger';

const logger = createChildLogger({ component: 'event-dispatcher' });

export interface DispatcherOptions {
     batchSize: number;
     pollIntervalMs: number;
     /** FAILED events are picked up again until they reach this many attempts */
     maxRetries: number;
}

export interface OutgoingEvent {
     id: number;
     type: string;
     payload: Record<string, unknown>;
}

export type EventPublisher = (event: OutgoingEvent) => Promise<void>;

interface DomainEventRow {
     id: string;
     type: string;
     payload: Record<string, unknown>;
     created_at: Date;
}

export const publishToExchange: EventPublisher = async (event) => {
     const channel = await getChannel();
     const accepted = channel.publish(
          BILLING_EVENTS_EXCHANGE,
          routingKeyFor(event.type),
          Buffer.from(JSON.stringify(event.payload)),
          {
               persistent: true,
               contentType: 'application/json',
               timestamp: Date.now(),
               messageId: event.id.toString(),
               type: event.type,
          }
     );
     if (!accepted) {
          // The message is buffered; hold further publishes until the channel drains
          await waitForDrain(channel);
     }
};

function waitForDrain(channel: Channel): Promise<void> {
     return new Promise((resolve, reject) => {
          const onDrain = () => {
               channel.off('close', onClose);
               resolve();
          };
          const onClose = () => {
               channel.off('drain', onDrain);
               reject(new Error('Channel closed before its write buffer drained'));
          };
          channel.once('drain', onDrain);
          channel.once('close', onClose);
     });
}

export function readDispatcherOptions(env: NodeJS.ProcessEnv = process.env): DispatcherOptions {
     return {
          batchSize: parseInt(env.EVENT_BATCH_SIZE || '100', 10),
          pollIntervalMs: parseInt(env.EVENT_POLL_INTERVAL_MS || '200', 10),
          maxRetries: parseInt(env.EVENT_MAX_RETRIES || '5', 10),
     };
}

/**
 * Relays committed rows of the domain_event outbox to the billing exchange.
 * Rows are claimed with SKIP LOCKED so several dispatchers can run side by side.
 */
export class EventDispatcher {
     private running = false;

     constructor(
          private readonly options: DispatcherOptions = readDispatcherOptions(),
          private readonly publish: EventPublisher = publishToExchange
     ) {}

     async start(): Promise<void> {
          this.running = true;
          logger.info(this.options, 'Starting event dispatcher');

          while (this.running) {
               try {
                    await this.processBatch();
               } catch (error) {
                    logger.error({ err: error }, 'Error processing event batch');
               }

               await this.sleep(this.options.pollIntervalMs);
          }
     }

     /** Returns the number of events published. */
     async processBatch(): Promise<number> {
          return withTransaction(async (client) => {
               const { rows: events } = await client.query<DomainEventRow>(
                    `
        SELECT id, type, payload, created_at
        FROM domain_event
        WHERE status = 'PENDING'
           OR (status = 'FAILED' AND retry_count < $2)
        ORDER BY created_at, id
        LIMIT $1
        FOR UPDATE SKIP LOCKED
      `,
                    [this.options.batchSize, this.options.maxRetries]
               );

               if (events.length === 0) {
                    return 0;
               }

               logger.debug({ eventCount: events.length }, 'Processing event batch');

               let sent = 0;
               for (const row of events) {
                    const event: OutgoingEvent = {
                         id: parseInt(String(row.id), 10),
                         type: row.type,
                         payload: row.payload,
                    };

                    try {
                         await this.publish(event);

                         await client.query(
                              `
            UPDATE domain_event
            SET status = 'SENT', updated_at = NOW(), error = NULL
            WHERE id = $1
          `,
                              [event.id]
                         );

                         sent++;
                         logger.debug({ eventId: event.id, type: event.type }, 'Event dispatched');
                    } catch (error) {
                         logger.error({ err: error, eventId: event.id }, 'Failed to dispatch event');

                         await client.query(
                              `
            UPDATE domain_event
            SET status = 'FAILED',
                updated_at = NOW(),
                retry_count = retry_count + 1,
                error = $2
            WHERE id = $1
          `,
                              [event.id, error instanceof Error ? error.message : 'Unknown error']
                         );
                    }
               }

               logger.info({ dispatched: sent, failed: events.length - sent }, 'Event batch processed');
               return sent;
          });
     }

     stop(): void {
          logger.info('Stopping event dispatcher');
          this.running = false;
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => setTimeout(resolve, ms));
     }
}
