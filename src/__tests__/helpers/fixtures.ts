import type { AppConfig, TokenSettings } from '../../config.js';
import type { HashingCost } from '../../domain/auth/credentialHasher.js';
import { EventBus } from '../../application/eventBus.js';
import { UserEvent } from '../../domain/users/events.js';
import { createLogger } from '../../infra/logger.js';

export const TEST_SECRET = 'test-secret';

// Lowest cost argon2 accepts; keeps the suite fast
export const testHashingCost: HashingCost = { timeCost: 2, memoryCost: 1024 };

export const testTokenSettings: TokenSettings = {
  secret: TEST_SECRET,
  algorithm: 'HS256',
  accessTokenTtlMinutes: 30,
};

export const testConfig: AppConfig = {
  nodeEnv: 'test',
  port: 0,
  databaseUrl: undefined,
  token: testTokenSettings,
  hashing: testHashingCost,
  logLevel: 'error',
  serviceName: 'user-directory-test',
};

export const silentLogger = createLogger({
  level: 'error',
  serviceName: 'user-directory-test',
  nodeEnv: 'test',
  silent: true,
});

export class RecordingEventBus implements EventBus {
  readonly published: UserEvent[] = [];

  async publish(events: readonly UserEvent[]): Promise<void> {
    this.published.push(...events);
  }
}
