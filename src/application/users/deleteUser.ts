import { UserDeleted } from '../../domain/users/events.js';
import { UserRepository } from '../../domain/users/userRepository.js';
import { EventBus } from '../eventBus.js';
import { NotFoundError } from '../errors.js';

export class DeleteUserUseCase {
  constructor(
    private userRepo: UserRepository,
    private eventBus: EventBus
  ) {}

  async execute(userId: string): Promise<void> {
    const deleted = await this.userRepo.delete(userId);
    if (!deleted) {
      throw new NotFoundError(`User with ID ${userId} not found`);
    }

    const event: UserDeleted = {
      type: 'UserDeleted',
      eventVersion: 1,
      userId,
      occurredAt: new Date(),
    };
    await this.eventBus.publish([event]);
  }
}
