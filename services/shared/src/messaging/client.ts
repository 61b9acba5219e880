import * as amqplib from 'amqplib';
import type { Channel, Options } from 'amqplib';
import type { DomainEvent } from '../types/commerce.types';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

export const NOTIFICATIONS_EXCHANGE = 'commerce.notifications';
export const NOTIFICATIONS_QUEUE = 'notifications.outbound';
export const DEAD_LETTER_EXCHANGE = 'dlx.commerce';
export const NOTIFICATIONS_DLQ = 'dlq.notifications.outbound';

export function notificationRoutingKey(event: Pick<DomainEvent, 'type'>): string {
     return `notification.${event.type}`;
}

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, reconnecting on next publish');
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

     await ch.assertExchange(NOTIFICATIONS_EXCHANGE, 'topic', { durable: true });
     await ch.assertExchange(DEAD_LETTER_EXCHANGE, 'topic', { durable: true });

     await ch.assertQueue(NOTIFICATIONS_QUEUE, {
          durable: true,
          deadLetterExchange: DEAD_LETTER_EXCHANGE,
          deadLetterRoutingKey: NOTIFICATIONS_DLQ,
     });
     await ch.assertQueue(NOTIFICATIONS_DLQ, { durable: true });

     await ch.bindQueue(NOTIFICATIONS_QUEUE, NOTIFICATIONS_EXCHANGE, 'notification.#');
     await ch.bindQueue(NOTIFICATIONS_DLQ, DEAD_LETTER_EXCHANGE, NOTIFICATIONS_DLQ);

     logger.info('RabbitMQ channel created and configured');

     channel = ch;
     return ch;
}

/** The part of an amqplib channel an outbox publish needs */
export interface PublishChannel {
     publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
     once(event: 'drain' | 'close', listener: () => void): unknown;
     removeListener(event: 'drain' | 'close', listener: () => void): unknown;
}

/**
 * Publish an outbox event on `ch`. The event id is the message id so consumers
 * can drop redeliveries. `publish` returning false means the write buffer is
 * full but the message is queued, so this waits for `drain` and only fails if
 * the channel closes first.
 */
export async function publishToChannel(ch: PublishChannel, event: DomainEvent): Promise<void> {
     const content = Buffer.from(
          JSON.stringify({
               id: event.id,
               type: event.type,
               occurredAt: event.createdAt.toISOString(),
               payload: event.payload,
          })
     );

     const accepted = ch.publish(NOTIFICATIONS_EXCHANGE, notificationRoutingKey(event), content, {
          persistent: true,
          contentType: 'application/json',
          timestamp: Date.now(),
          messageId: String(event.id),
          type: event.type,
     });
     if (accepted) return;

     logger.warn({ eventId: event.id }, 'Channel write buffer full, waiting for drain');
     await new Promise<void>((resolve, reject) => {
          const onDrain = () => {
               ch.removeListener('close', onClose);
               resolve();
          };
          const onClose = () => {
               ch.removeListener('drain', onDrain);
               reject(new Error(`Channel closed before event ${event.id} was flushed`));
          };
          ch.once('drain', onDrain);
          ch.once('close', onClose);
     });
}

export async function publishDomainEvent(event: DomainEvent): Promise<void> {
     const ch = await getChannel();
     await publishToChannel(ch, event);
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
