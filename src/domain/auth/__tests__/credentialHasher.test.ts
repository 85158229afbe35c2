import { describe, it, expect } from 'vitest';
import {
  CredentialHasher,
  isStrongPassword,
  validatePasswordStrength,
} from '../credentialHasher.js';
import { Credential } from '../credential.js';
import { ValidationError } from '../../errors.js';
import { testHashingCost } from '../../../__tests__/helpers/fixtures.js';

describe('password policy', () => {
  it.each(['short', 'alllowercase123', 'ALLUPPERCASE123', 'NoDigitsHere', ''])(
    'should reject %j',
    (password) => {
      expect(isStrongPassword(password)).toBe(false);
      expect(() => validatePasswordStrength(password)).toThrow(ValidationError);
    }
  );

  it('should accept a password with upper, lower and digit at 8 characters', () => {
    expect(isStrongPassword('Passw0rd')).toBe(true);
    expect(() => validatePasswordStrength('Passw0rd')).not.toThrow();
  });

  it('should reject a 7 character password that otherwise qualifies', () => {
    expect(isStrongPassword('Pass0rd')).toBe(false);
  });

  it('should count characters, not UTF-16 units', () => {
    expect('Ab1😀😀😀'.length).toBe(9);
    expect(isStrongPassword('Ab1😀😀😀')).toBe(false);
    expect(isStrongPassword('Ab1😀😀😀😀😀')).toBe(true);
  });

  it('should accept non-ASCII upper and lower case letters', () => {
    expect(isStrongPassword('ÄÖÜabcd1')).toBe(true);
    expect(isStrongPassword('äöüABCD1')).toBe(true);
    expect(isStrongPassword('ÄÖÜÉÈabc')).toBe(false);
  });
});

describe('CredentialHasher', () => {
  const hasher = new CredentialHasher(testHashingCost);

  describe('hash', () => {
    it('should produce an argon2id credential that verifies', async () => {
      const credential = await hasher.hash('Passw0rd');

      expect(credential.encoded.startsWith('$argon2id$')).toBe(true);
      expect(credential.encoded).not.toContain('Passw0rd');
      expect(await hasher.verify('Passw0rd', credential)).toBe(true);
    });

    it('should salt every hash', async () => {
      const first = await hasher.hash('Passw0rd');
      const second = await hasher.hash('Passw0rd');

      expect(first.encoded).not.toBe(second.encoded);
      expect(await hasher.verify('Passw0rd', first)).toBe(true);
      expect(await hasher.verify('Passw0rd', second)).toBe(true);
    });

    it.each(['short', 'alllowercase123', 'ALLUPPERCASE123', 'NoDigitsHere', ''])(
      'should fail with ValidationError for %j',
      async (password) => {
        await expect(hasher.hash(password)).rejects.toThrow(ValidationError);
        await expect(hasher.hash(password)).rejects.toThrow('Password does not meet requirements');
      }
    );

    it('should embed the configured cost parameters', async () => {
      const credential = await hasher.hash('Passw0rd');

      expect(credential.encoded).toContain('m=1024,t=2');
    });
  });

  describe('verify', () => {
    it('should return false for a wrong password', async () => {
      const credential = await hasher.hash('Passw0rd');

      expect(await hasher.verify('Passw0rd!', credential)).toBe(false);
      expect(await hasher.verify('passw0rd', credential)).toBe(false);
      expect(await hasher.verify('', credential)).toBe(false);
    });

    it('should reject when the stored hash cannot be decoded', async () => {
      const credential = Credential.fromEncoded('not-an-argon2-hash');

      await expect(hasher.verify('Passw0rd', credential)).rejects.toThrow();
    });
  });
});

describe('Credential', () => {
  it('should reject an empty stored hash', () => {
    expect(() => Credential.fromEncoded('')).toThrow('Hashed password cannot be empty');
  });

  it('should be frozen', () => {
    const credential = Credential.fromEncoded('$argon2id$stub');

    expect(Object.isFrozen(credential)).toBe(true);
  });

  it('should not serialize the hash', () => {
    const credential = Credential.fromEncoded('$argon2id$stub');

    expect(JSON.stringify({ credential })).toBe('{"credential":"[credential]"}');
  });
});
