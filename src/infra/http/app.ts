import express from 'express';
import type { AppConfig } from '../../config.js';
import { Authenticator } from '../../application/auth/login.js';
import { TokenService } from '../../application/auth/tokenService.js';
import { EventBus } from '../../application/eventBus.js';
import { ChangePasswordUseCase } from '../../application/users/changePassword.js';
import { CreateUserUseCase } from '../../application/users/createUser.js';
import { DeleteUserUseCase } from '../../application/users/deleteUser.js';
import { UserQueries } from '../../application/users/queries.js';
import { SetUserActiveUseCase } from '../../application/users/setUserActive.js';
import { UpdateUserUseCase } from '../../application/users/updateUser.js';
import { CredentialHasher } from '../../domain/auth/credentialHasher.js';
import { UserRepository } from '../../domain/users/userRepository.js';
import { LoggingEventBus } from '../events/loggingEventBus.js';
import type { Logger } from '../logger.js';
import { createAuthRoutes } from './routes/auth.js';
import { createUserRoutes } from './routes/users.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import {
  createApiRateLimiter,
  createLoginRateLimiter,
  RateLimitOptions,
} from './middleware/rateLimit.js';

export interface AppDeps {
  config: AppConfig;
  userRepo: UserRepository;
  logger: Logger;
  eventBus?: EventBus;
  /** Resolves when the backing store is reachable. */
  healthCheck?: () => Promise<unknown>;
  rateLimits?: {
    api?: RateLimitOptions;
    login?: RateLimitOptions;
  };
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Build the Express application from already-constructed collaborators.
 * Configuration is read once by the caller and injected here.
 */
export function createApp(deps: AppDeps): express.Express {
  const { config, userRepo, logger } = deps;
  const eventBus = deps.eventBus ?? new LoggingEventBus(logger);

  const hasher = new CredentialHasher(config.hashing);
  const tokenService = new TokenService(config.token);
  const authenticator = new Authenticator(userRepo, hasher, tokenService, logger);

  const app = express();
  app.use(express.json());
  app.use(createApiRateLimiter(deps.rateLimits?.api));

  const healthCheck = deps.healthCheck ?? (() => Promise.resolve());
  app.get('/healthz', (_req, res, next) => {
    withTimeout(healthCheck(), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((err: unknown) => {
        logger.warn('Health check failed', { err });
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.use(createSwaggerRoutes());

  app.use(
    '/api/v1/auth',
    createAuthRoutes({
      authenticator,
      tokenService,
      loginRateLimiter: createLoginRateLimiter(deps.rateLimits?.login),
    })
  );

  app.use(
    '/api/v1/users',
    createUserRoutes({
      tokenService,
      createUser: new CreateUserUseCase(userRepo, hasher, eventBus),
      updateUser: new UpdateUserUseCase(userRepo, eventBus),
      setUserActive: new SetUserActiveUseCase(userRepo, eventBus),
      changePassword: new ChangePasswordUseCase(userRepo, hasher, eventBus),
      deleteUser: new DeleteUserUseCase(userRepo, eventBus),
      queries: new UserQueries(userRepo),
    })
  );

  // Error handler (must be last)
  app.use(createErrorHandler(logger));

  return app;
}
