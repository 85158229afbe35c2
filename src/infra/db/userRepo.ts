import { ConflictError } from '../../application/errors.js';
import { User } from '../../domain/users/user.js';
import { UserLookup, UserRepository } from '../../domain/users/userRepository.js';
import { normalizeEmail } from '../../domain/users/valueObjects.js';
import type { DbPool } from './pool.js';

interface UserRow {
  id: string;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  password_hash: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

function isUniqueViolation(error: unknown): error is { code: string; constraint?: string } {
  return !!error && typeof error === 'object' && 'code' in error && error.code === '23505';
}

const USER_COLUMNS = `id, email, username, first_name, last_name, password_hash,
       is_active, created_at, updated_at`;

function toUser(row: UserRow): User {
  return User.restore({
    id: row.id,
    email: row.email,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    passwordHash: row.password_hash,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  });
}

export class PgUserRepo implements UserRepository {
  constructor(private pool: DbPool) {}

  async findByEmail(email: string): Promise<UserLookup> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE LOWER(email) = $1`,
      [normalizeEmail(email)]
    );

    if (result.rows.length === 0) {
      return { kind: 'not_found' };
    }
    return { kind: 'found', user: toUser(result.rows[0]) };
  }

  async findById(id: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async existsByEmail(email: string): Promise<boolean> {
    const result = await this.pool.query(
      'SELECT 1 FROM users WHERE LOWER(email) = $1',
      [normalizeEmail(email)]
    );
    return result.rows.length > 0;
  }

  async existsByUsername(username: string): Promise<boolean> {
    const result = await this.pool.query(
      'SELECT 1 FROM users WHERE username = $1',
      [username]
    );
    return result.rows.length > 0;
  }

  async findAll(limit: number, offset: number): Promise<User[]> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users
       ORDER BY created_at, id
       LIMIT $1 OFFSET $2`,
      [limit, offset]
    );
    return result.rows.map(toUser);
  }

  /**
   * Insert or update. The whole row is written, credential included.
   */
  async save(user: User): Promise<User> {
    const s = user.toSnapshot();
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (id, email, username, first_name, last_name, password_hash,
                            is_active, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         ON CONFLICT (id) DO UPDATE SET
           email = EXCLUDED.email,
           username = EXCLUDED.username,
           first_name = EXCLUDED.first_name,
           last_name = EXCLUDED.last_name,
           password_hash = EXCLUDED.password_hash,
           is_active = EXCLUDED.is_active,
           updated_at = EXCLUDED.updated_at
         RETURNING ${USER_COLUMNS}`,
        [
          s.id,
          s.email,
          s.username,
          s.firstName,
          s.lastName,
          s.passwordHash,
          s.isActive,
          s.createdAt,
          s.updatedAt,
        ]
      );
      return toUser(result.rows[0]);
    } catch (error: unknown) {
      // A concurrent insert can pass the exists* checks and still hit a unique index
      if (isUniqueViolation(error)) {
        throw error.constraint === 'users_username_key'
          ? new ConflictError(`User with username ${s.username} already exists`)
          : new ConflictError(`User with email ${s.email} already exists`);
      }
      throw error;
    }
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM users WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
