import { UserRepository } from '../../domain/users/userRepository.js';
import { UserDto, UserListDto, toUserDto } from './dto.js';

export const DEFAULT_PAGE_SIZE = 100;

/**
 * Read-side queries for users.
 */
export class UserQueries {
  constructor(private userRepo: UserRepository) {}

  async getById(userId: string): Promise<UserDto | null> {
    const user = await this.userRepo.findById(userId);
    return user ? toUserDto(user) : null;
  }

  async list(limit = DEFAULT_PAGE_SIZE, offset = 0): Promise<UserListDto> {
    const users = await this.userRepo.findAll(limit, offset);
    const dtos = users.map(toUserDto);

    return {
      users: dtos,
      total: dtos.length,
      limit,
      offset,
    };
  }
}
