import { User } from './user.js';

/**
 * Result of looking a user up by email. "Not found" is a value, not an error.
 */
export type UserLookup = { kind: 'found'; user: User } | { kind: 'not_found' };

/**
 * The slice of the user store the authenticator needs.
 * Implementations normalize the email before looking it up.
 */
export interface UserDirectory {
  findByEmail(email: string): Promise<UserLookup>;
}

export interface UserRepository extends UserDirectory {
  save(user: User): Promise<User>;
  findById(id: string): Promise<User | null>;
  existsByEmail(email: string): Promise<boolean>;
  existsByUsername(username: string): Promise<boolean>;
  findAll(limit: number, offset: number): Promise<User[]>;
  delete(id: string): Promise<boolean>;
}
