import { registerAs } from '@nestjs/config';

import { IsOptional, IsString, Matches } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { AuthConfig } from './auth-config.type';

class EnvironmentVariablesValidator {
  @IsString()
  AUTH_JWT_SECRET!: string;

  @IsString()
  @Matches(/^\d+(\.\d+)?\s*(ms|s|m|h|d|w|y)?$/)
  @IsOptional()
  AUTH_JWT_TOKEN_EXPIRES_IN?: string;
}

export default registerAs<AuthConfig>('auth', () => {
  const validated = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    secret: validated.AUTH_JWT_SECRET,
    expires: validated.AUTH_JWT_TOKEN_EXPIRES_IN ?? '30m',
  };
});
