import { ConflictError, NotFoundError } from '@switchyard/http-adapter';
import { Logger } from '@switchyard/logger';

import type { User, UserInput } from './interfaces';
import type { UserRepository } from './users.repository';

export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(private readonly userRepository: UserRepository) {}

  findAll(): User[] {
    return this.userRepository.findAll();
  }

  findOneById(id: number): User {
    const user = this.userRepository.findOneById(id);

    if (user === undefined) {
      throw new NotFoundError(`User ${id} does not exist.`);
    }

    return user;
  }

  create(input: UserInput): User {
    if (this.userRepository.findOneByEmail(input.email) !== undefined) {
      throw new ConflictError(`The email '${input.email}' is already registered.`);
    }

    const user = this.userRepository.create(input);

    this.logger.info('User created', { id: user.id });

    return user;
  }

  update(id: number, input: UserInput): User {
    const user = this.userRepository.updateById(id, input);

    if (user === undefined) {
      throw new NotFoundError(`User ${id} does not exist.`);
    }

    return user;
  }

  delete(id: number): void {
    if (!this.userRepository.deleteById(id)) {
      throw new NotFoundError(`User ${id} does not exist.`);
    }

    this.logger.info('User deleted', { id });
  }
}
