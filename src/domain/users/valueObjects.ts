import { ValidationError } from '../errors.js';

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const USERNAME_PATTERN = /^[a-zA-Z0-9_]+$/;

/**
 * Lowercase and trim an email so it can be used as a lookup key.
 */
export function normalizeEmail(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * Email value object. Always stored lowercase; this is the login key.
 */
export class Email {
  private constructor(public readonly value: string) {}

  static parse(raw: string): Email {
    const trimmed = raw.trim();
    if (!EMAIL_PATTERN.test(trimmed)) {
      throw new ValidationError(`Invalid email format: ${raw}`);
    }
    return new Email(normalizeEmail(trimmed));
  }
}

export class Username {
  private constructor(public readonly value: string) {}

  static parse(raw: string): Username {
    if (!raw || raw.length < 3 || raw.length > 50 || !USERNAME_PATTERN.test(raw)) {
      throw new ValidationError(`Invalid username: ${raw}`);
    }
    return new Username(raw);
  }
}

export class FullName {
  private constructor(
    public readonly firstName: string,
    public readonly lastName: string
  ) {}

  static of(firstName: string, lastName: string): FullName {
    if (!firstName || !firstName.trim()) {
      throw new ValidationError('First name cannot be empty');
    }
    if (!lastName || !lastName.trim()) {
      throw new ValidationError('Last name cannot be empty');
    }
    return new FullName(firstName.trim(), lastName.trim());
  }

  get fullName(): string {
    return `${this.firstName} ${this.lastName}`;
  }

  equals(other: FullName): boolean {
    return this.firstName === other.firstName && this.lastName === other.lastName;
  }
}
