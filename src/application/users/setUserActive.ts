import { UserRepository } from '../../domain/users/userRepository.js';
import { EventBus } from '../eventBus.js';
import { NotFoundError } from '../errors.js';
import { UserDto, toUserDto } from './dto.js';

export interface SetUserActiveCommand {
  userId: string;
  active: boolean;
}

/**
 * Activate or deactivate an account. Inactive accounts cannot log in,
 * but tokens already issued stay valid until they expire.
 */
export class SetUserActiveUseCase {
  constructor(
    private userRepo: UserRepository,
    private eventBus: EventBus
  ) {}

  async execute(command: SetUserActiveCommand): Promise<UserDto> {
    const user = await this.userRepo.findById(command.userId);
    if (!user) {
      throw new NotFoundError(`User with ID ${command.userId} not found`);
    }

    const event = command.active ? user.activate() : user.deactivate();
    if (!event) {
      return toUserDto(user);
    }

    const saved = await this.userRepo.save(user);
    await this.eventBus.publish([event]);

    return toUserDto(saved);
  }
}
