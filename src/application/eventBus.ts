import { UserEvent } from '../domain/users/events.js';

/**
 * Outbound port for domain events. Delivery guarantees belong to the
 * implementation.
 */
export interface EventBus {
  publish(events: readonly UserEvent[]): Promise<void>;
}
