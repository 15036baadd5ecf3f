import * as amqplib from 'amqplib';
import type { Channel } from 'amqplib';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

// Consumers declare and bind their own queues
export const BILLING_EVENTS_EXCHANGE = 'billing.events';

export function routingKeyFor(eventType: string): string {
     return `billing.${eventType}`;
}

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, will reconnect on next publish');
          connection = null;
          channel = null;
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

export async function getChannel(): Promise<Channel> {
     if (channel) return channel;

     if (!connection) {
          connection = await connect();
     }

     const ch = await connection.createChannel();

     await ch.assertExchange(BILLING_EVENTS_EXCHANGE, 'topic', { durable: true });

     logger.info('RabbitMQ channel created and configured');

     channel = ch;
     return ch;
}

export async function closeConnection(): Promise<void> {
     if (channel) {
          await channel.close();
          channel = null;
     }
     if (connection) {
          await connection.close();
          connection = null;
     }
     logger.info('RabbitMQ connection closed');
}
