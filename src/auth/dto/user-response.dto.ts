import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class UserResponseDto {
  @ApiProperty()
  @Expose()
  id!: string;

  @ApiProperty({ example: 'test1@example.com' })
  @Expose()
  email!: string;

  @ApiProperty({ example: 'John' })
  @Expose()
  firstName!: string;

  @ApiProperty({ example: 'Doe' })
  @Expose()
  lastName!: string;

  @ApiProperty()
  @Expose()
  isActive!: boolean;

  @ApiProperty({ nullable: true })
  @Expose()
  lastLoginAt!: Date | null;

  @ApiProperty()
  @Expose()
  createdAt!: Date;

  // passwordHash is never exposed
}
