import { ApiProperty } from '@nestjs/swagger';
import { UserResponseDto } from './user-response.dto';

export class LoginResponseDto {
  @ApiProperty()
  token!: string;

  @ApiProperty({ description: 'Expiry as epoch milliseconds' })
  tokenExpires!: number;

  @ApiProperty({ type: () => UserResponseDto })
  user!: UserResponseDto;
}
