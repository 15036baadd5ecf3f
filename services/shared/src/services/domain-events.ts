import { PoolClient } from 'pg';
import { DomainEventPayloads } from '../types/billing.types';

/**
 * Writes an event to the outbox on the caller's transaction; the event
 * dispatcher publishes it only once that transaction has committed.
 */
export async function enqueueDomainEvent<K extends keyof DomainEventPayloads>(
     client: PoolClient,
     type: K,
     payload: DomainEventPayloads[K]
): Promise<void> {
     await client.query(
          `
      INSERT INTO domain_event (type, payload)
      VALUES ($1, $2::jsonb)
    `,
          [type, JSON.stringify(payload)]
     );
}
