import { Module } from '@nestjs/common';
import { UsersService } from './users.service';

// UserRepository comes from the global persistence module
@Module({
  providers: [UsersService],
  exports: [UsersService],
})
export class UsersModule {}
