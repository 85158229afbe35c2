import { argon2id, hash as argon2Hash, verify as argon2Verify } from 'argon2';
import { ValidationError } from '../errors.js';
import { Credential } from './credential.js';

const MIN_PASSWORD_LENGTH = 8;

/** argon2id cost: iterations and memory in KiB. */
export interface HashingCost {
  readonly timeCost: number;
  readonly memoryCost: number;
}

// Length is counted in code points, and letter case and digits follow Unicode
export function isStrongPassword(plain: string): boolean {
  if (!plain || [...plain].length < MIN_PASSWORD_LENGTH) {
    return false;
  }
  return /\p{Lu}/u.test(plain) && /\p{Ll}/u.test(plain) && /\p{Nd}/u.test(plain);
}

/**
 * Enforce the password policy: at least 8 characters with an uppercase
 * letter, a lowercase letter and a digit.
 */
export function validatePasswordStrength(plain: string): void {
  if (!isStrongPassword(plain)) {
    throw new ValidationError('Password does not meet requirements');
  }
}

/**
 * Password hashing using Argon2id.
 * The strength policy is checked here so that no path can persist a
 * credential for a password that never met it.
 */
export class CredentialHasher {
  constructor(private readonly cost: HashingCost) {}

  async hash(plain: string): Promise<Credential> {
    validatePasswordStrength(plain);

    const encoded = await argon2Hash(plain, {
      type: argon2id,
      timeCost: this.cost.timeCost,
      memoryCost: this.cost.memoryCost,
    });
    return Credential.fromEncoded(encoded);
  }

  /**
   * Verify a plain password against a stored credential.
   * A mismatch is `false`. A stored hash argon2 cannot decode rejects.
   */
  async verify(plain: string, credential: Credential): Promise<boolean> {
    return argon2Verify(credential.encoded, plain);
  }
}
