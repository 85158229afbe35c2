import { randomUUID } from 'crypto';
import { Credential } from '../auth/credential.js';
import { Email, FullName, Username } from './valueObjects.js';
import { UserCreated, UserUpdated } from './events.js';

/**
 * Flat, persistence-friendly view of a user.
 */
export interface UserSnapshot {
  readonly id: string;
  readonly email: string;
  readonly username: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly passwordHash: string;
  readonly isActive: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

interface UserState {
  id: string;
  email: Email;
  username: Username;
  name: FullName;
  credential: Credential;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewUser {
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  credential: Credential;
}

/**
 * User aggregate. Mutating methods return the event to publish, or null
 * when the call changed nothing.
 */
export class User {
  private constructor(private state: UserState) {}

  static create(input: NewUser, now: Date = new Date()): { user: User; event: UserCreated } {
    const user = new User({
      id: randomUUID(),
      email: Email.parse(input.email),
      username: Username.parse(input.username),
      name: FullName.of(input.firstName, input.lastName),
      credential: input.credential,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    });

    const event: UserCreated = {
      type: 'UserCreated',
      eventVersion: 1,
      userId: user.id,
      email: user.email,
      username: user.username,
      occurredAt: now,
    };

    return { user, event };
  }

  /**
   * Rebuild a user from stored data.
   */
  static restore(snapshot: UserSnapshot): User {
    return new User({
      id: snapshot.id,
      email: Email.parse(snapshot.email),
      username: Username.parse(snapshot.username),
      name: FullName.of(snapshot.firstName, snapshot.lastName),
      credential: Credential.fromEncoded(snapshot.passwordHash),
      isActive: snapshot.isActive,
      createdAt: snapshot.createdAt,
      updatedAt: snapshot.updatedAt,
    });
  }

  get id(): string {
    return this.state.id;
  }

  get email(): string {
    return this.state.email.value;
  }

  get username(): string {
    return this.state.username.value;
  }

  get name(): FullName {
    return this.state.name;
  }

  get credential(): Credential {
    return this.state.credential;
  }

  get isActive(): boolean {
    return this.state.isActive;
  }

  get createdAt(): Date {
    return this.state.createdAt;
  }

  get updatedAt(): Date {
    return this.state.updatedAt;
  }

  updateProfile(
    changes: { firstName?: string; lastName?: string },
    now: Date = new Date()
  ): UserUpdated | null {
    if (changes.firstName === undefined && changes.lastName === undefined) {
      return null;
    }

    const name = FullName.of(
      changes.firstName ?? this.state.name.firstName,
      changes.lastName ?? this.state.name.lastName
    );
    if (name.equals(this.state.name)) {
      return null;
    }

    this.state = { ...this.state, name, updatedAt: now };
    return this.updated({ fullName: name.fullName }, now);
  }

  deactivate(now: Date = new Date()): UserUpdated | null {
    if (!this.state.isActive) {
      return null;
    }
    this.state = { ...this.state, isActive: false, updatedAt: now };
    return this.updated({ isActive: false }, now);
  }

  activate(now: Date = new Date()): UserUpdated | null {
    if (this.state.isActive) {
      return null;
    }
    this.state = { ...this.state, isActive: true, updatedAt: now };
    return this.updated({ isActive: true }, now);
  }

  /**
   * Swap the stored credential for a freshly hashed one.
   */
  replaceCredential(credential: Credential, now: Date = new Date()): UserUpdated {
    this.state = { ...this.state, credential, updatedAt: now };
    return this.updated({ credential: 'replaced' }, now);
  }

  toSnapshot(): UserSnapshot {
    return {
      id: this.state.id,
      email: this.state.email.value,
      username: this.state.username.value,
      firstName: this.state.name.firstName,
      lastName: this.state.name.lastName,
      passwordHash: this.state.credential.encoded,
      isActive: this.state.isActive,
      createdAt: this.state.createdAt,
      updatedAt: this.state.updatedAt,
    };
  }

  private updated(changes: UserUpdated['changes'], now: Date): UserUpdated {
    return {
      type: 'UserUpdated',
      eventVersion: 1,
      userId: this.state.id,
      changes,
      occurredAt: now,
    };
  }
}
