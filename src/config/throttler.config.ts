import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, Min } from 'class-validator';
import validateConfig from '../utils/validate-config';
import { ThrottlerConfig } from './throttler-config.type';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1)
  @IsOptional()
  THROTTLE_TTL?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  THROTTLE_LIMIT?: number;
}

export default registerAs<ThrottlerConfig>('throttler', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    ttl: parseInt(process.env.THROTTLE_TTL ?? '60000', 10), // milliseconds
    limit: parseInt(process.env.THROTTLE_LIMIT ?? '60', 10), // requests per ttl window
  };
});
