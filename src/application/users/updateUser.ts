import { UserRepository } from '../../domain/users/userRepository.js';
import { EventBus } from '../eventBus.js';
import { NotFoundError } from '../errors.js';
import { UserDto, toUserDto } from './dto.js';

export interface UpdateUserCommand {
  userId: string;
  firstName?: string;
  lastName?: string;
}

export class UpdateUserUseCase {
  constructor(
    private userRepo: UserRepository,
    private eventBus: EventBus
  ) {}

  async execute(command: UpdateUserCommand): Promise<UserDto> {
    const user = await this.userRepo.findById(command.userId);
    if (!user) {
      throw new NotFoundError(`User with ID ${command.userId} not found`);
    }

    const event = user.updateProfile({
      firstName: command.firstName,
      lastName: command.lastName,
    });
    if (!event) {
      return toUserDto(user);
    }

    const saved = await this.userRepo.save(user);
    await this.eventBus.publish([event]);

    return toUserDto(saved);
  }
}
