/**
 * Domain events emitted by the User aggregate.
 */

export interface UserCreated {
  readonly type: 'UserCreated';
  readonly eventVersion: 1;
  readonly userId: string;
  readonly email: string;
  readonly username: string;
  readonly occurredAt: Date;
}

export interface UserChanges {
  fullName?: string;
  isActive?: boolean;
  credential?: 'replaced';
}

export interface UserUpdated {
  readonly type: 'UserUpdated';
  readonly eventVersion: 1;
  readonly userId: string;
  readonly changes: UserChanges;
  readonly occurredAt: Date;
}

export interface UserDeleted {
  readonly type: 'UserDeleted';
  readonly eventVersion: 1;
  readonly userId: string;
  readonly occurredAt: Date;
}

export type UserEvent = UserCreated | UserUpdated | UserDeleted;
