import { EventBus } from '../../application/eventBus.js';
import { UserEvent } from '../../domain/users/events.js';
import { logger as sharedLogger, type Logger } from '../logger.js';

/**
 * Event bus that only records events in the structured log.
 */
export class LoggingEventBus implements EventBus {
  constructor(private readonly logger: Logger = sharedLogger) {}

  async publish(events: readonly UserEvent[]): Promise<void> {
    for (const event of events) {
      this.logger.info('Domain event published', {
        eventType: event.type,
        userId: event.userId,
        event,
      });
    }
  }
}
