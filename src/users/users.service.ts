import { Injectable, Logger } from '@nestjs/common';
import bcrypt from 'bcryptjs';
import { UserRepository } from './infrastructure/persistence/user.repository';
import { User } from './domain/user';
import { NullableType } from '../utils/types/nullable.type';
import { DomainError } from '../utils/errors/domain-error';

export interface CreateUserInput {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(private readonly usersRepository: UserRepository) {}

  async create(input: CreateUserInput): Promise<User> {
    const email = normalizeEmail(input.email);

    // The unique index still catches a concurrent duplicate
    const existing = await this.usersRepository.findByEmail(email);
    if (existing) {
      throw DomainError.conflict('Email already registered');
    }

    const salt = await bcrypt.genSalt();
    const passwordHash = await bcrypt.hash(input.password, salt);

    const user = await this.usersRepository.create({
      email,
      passwordHash,
      firstName: input.firstName.trim(),
      lastName: input.lastName.trim(),
    });

    this.logger.log(`Registered user ${user.id}`);
    return user;
  }

  findById(id: User['id']): Promise<NullableType<User>> {
    return this.usersRepository.findById(id);
  }

  findByEmail(email: User['email']): Promise<NullableType<User>> {
    return this.usersRepository.findByEmail(normalizeEmail(email));
  }

  async recordLogin(id: User['id']): Promise<User> {
    const user = await this.usersRepository.update(id, {
      lastLoginAt: new Date(),
    });
    if (!user) {
      throw DomainError.notFound('User');
    }
    return user;
  }

  /**
   * Users are never hard-deleted; their documents and history stay intact.
   */
  async deactivate(id: User['id']): Promise<void> {
    const user = await this.usersRepository.update(id, { isActive: false });
    if (!user) {
      throw DomainError.notFound('User');
    }
    this.logger.log(`Deactivated user ${id}`);
  }
}
