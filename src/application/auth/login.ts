import { CredentialHasher } from '../../domain/auth/credentialHasher.js';
import { UserDirectory } from '../../domain/users/userRepository.js';
import { UnauthorizedError } from '../errors.js';
import type { Logger } from '../logger.js';
import { TokenGrant, TokenService } from './tokenService.js';

export interface LoginCommand {
  email: string;
  password: string;
}

const INVALID_CREDENTIALS = 'Invalid email or password';

type LoginFailure = 'unknown_email' | 'inactive_account' | 'invalid_password';

/**
 * Login: look the user up, check the account is active, verify the
 * password, then mint a token. The three failures look identical to the
 * caller so an email's existence is never revealed.
 */
export class Authenticator {
  constructor(
    private readonly users: UserDirectory,
    private readonly hasher: CredentialHasher,
    private readonly tokens: TokenService,
    private readonly logger: Logger
  ) {}

  async authenticate(email: string, password: string): Promise<TokenGrant> {
    const lookup = await this.users.findByEmail(email);
    if (lookup.kind === 'not_found') {
      throw this.reject('unknown_email');
    }

    const { user } = lookup;
    if (!user.isActive) {
      throw this.reject('inactive_account', user.id);
    }

    const matches = await this.hasher.verify(password, user.credential);
    if (!matches) {
      throw this.reject('invalid_password', user.id);
    }

    const grant = this.tokens.issue(user.id, user.email);
    this.logger.info('Login succeeded', { userId: user.id });
    return grant;
  }

  async execute(command: LoginCommand): Promise<TokenGrant> {
    return this.authenticate(command.email, command.password);
  }

  private reject(reason: LoginFailure, userId?: string): UnauthorizedError {
    this.logger.warn('Login rejected', { reason, userId });
    return new UnauthorizedError(INVALID_CREDENTIALS);
  }
}
