import { NullableType } from '../../utils/types/nullable.type';

export interface User {
  id: string;
  email: string; // stored lower-cased
  passwordHash: string; // bcrypt, never returned to clients
  firstName: string;
  lastName: string;
  isActive: boolean;
  lastLoginAt: NullableType<Date>;
  createdAt: Date;
  updatedAt: Date;
}
