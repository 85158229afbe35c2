import { CredentialHasher } from '../../domain/auth/credentialHasher.js';
import { UserRepository } from '../../domain/users/userRepository.js';
import { EventBus } from '../eventBus.js';
import { NotFoundError, UnauthorizedError } from '../errors.js';

export interface ChangePasswordCommand {
  userId: string;
  currentPassword: string;
  newPassword: string;
}

export class ChangePasswordUseCase {
  constructor(
    private userRepo: UserRepository,
    private hasher: CredentialHasher,
    private eventBus: EventBus
  ) {}

  async execute(command: ChangePasswordCommand): Promise<void> {
    const user = await this.userRepo.findById(command.userId);
    if (!user) {
      throw new NotFoundError(`User with ID ${command.userId} not found`);
    }

    const matches = await this.hasher.verify(command.currentPassword, user.credential);
    if (!matches) {
      throw new UnauthorizedError('Current password is incorrect');
    }

    const credential = await this.hasher.hash(command.newPassword);
    const event = user.replaceCredential(credential);

    await this.userRepo.save(user);
    await this.eventBus.publish([event]);
  }
}
