import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { UserEntity } from '../entities/user.entity';
import { UserMapper } from '../mappers/user.mapper';
import { NewUser, UserRepository } from '../../user.repository';
import { User } from '../../../../domain/user';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { guardQuery } from '../../../../../database/translate-driver-error';

@Injectable()
export class UsersRelationalRepository implements UserRepository {
  constructor(
    @InjectRepository(UserEntity)
    private readonly usersRepository: Repository<UserEntity>,
  ) {}

  async create(data: NewUser): Promise<User> {
    return guardQuery(async () => {
      const entity = await this.usersRepository.save(
        this.usersRepository.create({ ...data, isActive: true }),
      );
      return UserMapper.toDomain(entity);
    });
  }

  async findById(id: User['id']): Promise<NullableType<User>> {
    return guardQuery(async () => {
      const entity = await this.usersRepository.findOne({ where: { id } });
      return entity ? UserMapper.toDomain(entity) : null;
    });
  }

  async findByEmail(email: User['email']): Promise<NullableType<User>> {
    return guardQuery(async () => {
      const entity = await this.usersRepository.findOne({ where: { email } });
      return entity ? UserMapper.toDomain(entity) : null;
    });
  }

  async update(
    id: User['id'],
    payload: Partial<Pick<User, 'isActive' | 'lastLoginAt'>>,
  ): Promise<NullableType<User>> {
    return guardQuery(async () => {
      await this.usersRepository.update(id, payload);
      const entity = await this.usersRepository.findOne({ where: { id } });
      return entity ? UserMapper.toDomain(entity) : null;
    });
  }
}
