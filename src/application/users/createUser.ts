import { CredentialHasher } from '../../domain/auth/credentialHasher.js';
import { User } from '../../domain/users/user.js';
import { UserRepository } from '../../domain/users/userRepository.js';
import { Email } from '../../domain/users/valueObjects.js';
import { EventBus } from '../eventBus.js';
import { ConflictError } from '../errors.js';
import { UserDto, toUserDto } from './dto.js';

export interface CreateUserCommand {
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  password: string;
}

export class CreateUserUseCase {
  constructor(
    private userRepo: UserRepository,
    private hasher: CredentialHasher,
    private eventBus: EventBus
  ) {}

  async execute(command: CreateUserCommand): Promise<UserDto> {
    const email = Email.parse(command.email);

    if (await this.userRepo.existsByEmail(email.value)) {
      throw new ConflictError(`User with email ${email.value} already exists`);
    }
    if (await this.userRepo.existsByUsername(command.username)) {
      throw new ConflictError(`User with username ${command.username} already exists`);
    }

    // Password policy is enforced by the hasher
    const credential = await this.hasher.hash(command.password);

    const { user, event } = User.create({
      email: email.value,
      username: command.username,
      firstName: command.firstName,
      lastName: command.lastName,
      credential,
    });

    const saved = await this.userRepo.save(user);
    await this.eventBus.publish([event]);

    return toUserDto(saved);
  }
}
