import { ValidationError } from '../errors.js';

/**
 * Stored, non-reversible representation of a password.
 * The encoded argon2 string carries its own salt and cost parameters.
 * Instances are frozen; changing a password means building a new one.
 */
export class Credential {
  private constructor(public readonly encoded: string) {
    Object.freeze(this);
  }

  /**
   * Rebuild a credential from a stored hash (e.g. a database column).
   */
  static fromEncoded(encoded: string): Credential {
    if (!encoded) {
      throw new ValidationError('Hashed password cannot be empty');
    }
    return new Credential(encoded);
  }

  toJSON(): string {
    return '[credential]';
  }
}
