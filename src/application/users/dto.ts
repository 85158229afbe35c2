import { User } from '../../domain/users/user.js';

/**
 * Public shape of a user. The credential never leaves the domain.
 */
export interface UserDto {
  id: string;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  fullName: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface UserListDto {
  users: UserDto[];
  total: number;
  limit: number;
  offset: number;
}

export function toUserDto(user: User): UserDto {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    firstName: user.name.firstName,
    lastName: user.name.lastName,
    fullName: user.name.fullName,
    isActive: user.isActive,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}
