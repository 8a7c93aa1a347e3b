import { NullableType } from '../../../utils/types/nullable.type';
import { User } from '../../domain/user';

export type NewUser = Pick<
  User,
  'email' | 'passwordHash' | 'firstName' | 'lastName'
>;

export abstract class UserRepository {
  /**
   * Insert a user. A duplicate email surfaces as a Conflict DomainError.
   */
  abstract create(data: NewUser): Promise<User>;

  abstract findById(id: User['id']): Promise<NullableType<User>>;

  /**
   * Lookup by email; callers pass the normalised (lower-cased) address
   */
  abstract findByEmail(email: User['email']): Promise<NullableType<User>>;

  abstract update(
    id: User['id'],
    payload: Partial<Pick<User, 'isActive' | 'lastLoginAt'>>,
  ): Promise<NullableType<User>>;
}
