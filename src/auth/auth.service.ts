import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { plainToClass } from 'class-transformer';
import bcrypt from 'bcryptjs';
import ms from 'ms';
import { AuthEmailLoginDto } from './dto/auth-email-login.dto';
import { AuthRegisterDto } from './dto/auth-register.dto';
import { LoginResponseDto } from './dto/login-response.dto';
import { UserResponseDto } from './dto/user-response.dto';
import { JwtPayloadType, isJwtPayload } from './strategies/types/jwt-payload.type';
import { UserIdentity } from './strategies/types/user-identity.type';
import { UsersService } from '../users/users.service';
import { User } from '../users/domain/user';
import { AllConfigType } from '../config/config.type';
import {
  ActivityContext,
  ActivityRecorderService,
} from '../activity/activity-recorder.service';
import { ActivityAction } from '../activity/domain/entities/activity-action.enum';
import { DomainError } from '../utils/errors/domain-error';

/**
 * Auth Service
 *
 * Email/password registration and login, access-token issuing and the
 * identity resolution shared by the jwt strategy and `verify`.
 *
 * Every login failure is the same 401 so callers cannot probe which
 * emails are registered.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly usersService: UsersService,
    private readonly configService: ConfigService<AllConfigType>,
    private readonly activityRecorder: ActivityRecorderService,
  ) {}

  async register(
    dto: AuthRegisterDto,
    context?: ActivityContext,
  ): Promise<UserResponseDto> {
    const user = await this.usersService.create(dto);

    await this.activityRecorder.record(
      user.id,
      null,
      ActivityAction.REGISTER,
      {},
      context,
    );

    return this.toUserDto(user);
  }

  async validateLogin(loginDto: AuthEmailLoginDto): Promise<LoginResponseDto> {
    const user = await this.usersService.findByEmail(loginDto.email);

    if (!user) {
      this.logger.warn('Login failed: unknown email');
      throw new UnauthorizedException('Invalid email or password');
    }

    const isValidPassword = await bcrypt.compare(
      loginDto.password,
      user.passwordHash,
    );
    if (!isValidPassword) {
      this.logger.warn(`Login failed for user ${user.id}: incorrect password`);
      throw new UnauthorizedException('Invalid email or password');
    }

    if (!user.isActive) {
      this.logger.warn(`Login failed for user ${user.id}: account inactive`);
      throw new UnauthorizedException('Invalid email or password');
    }

    const loggedIn = await this.usersService.recordLogin(user.id);
    const { token, tokenExpires } = await this.getTokenData(user.id);

    this.logger.log(`User ${user.id} logged in`);

    return {
      token,
      tokenExpires,
      user: this.toUserDto(loggedIn),
    };
  }

  /**
   * Verifies signature and expiry, then requires the user to still exist
   * and be active.
   */
  async verify(token: string): Promise<UserIdentity> {
    let payload: unknown;
    try {
      payload = await this.jwtService.verifyAsync<JwtPayloadType>(token, {
        secret: this.configService.getOrThrow('auth.secret', { infer: true }),
      });
    } catch (error) {
      this.logger.debug(
        `Token rejected: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new UnauthorizedException();
    }

    if (!isJwtPayload(payload)) {
      throw new UnauthorizedException();
    }
    return this.resolveIdentity(payload.id);
  }

  async resolveIdentity(userId: User['id']): Promise<UserIdentity> {
    const user = await this.usersService.findById(userId);
    if (!user || !user.isActive) {
      throw new UnauthorizedException();
    }
    return { id: user.id, email: user.email };
  }

  async me(identity: UserIdentity): Promise<UserResponseDto> {
    const user = await this.usersService.findById(identity.id);
    if (!user) {
      throw DomainError.notFound('User');
    }
    return this.toUserDto(user);
  }

  async deactivate(
    identity: UserIdentity,
    context?: ActivityContext,
  ): Promise<void> {
    await this.usersService.deactivate(identity.id);

    await this.activityRecorder.record(
      identity.id,
      null,
      ActivityAction.DEACTIVATE,
      {},
      context,
    );
  }

  private async getTokenData(
    userId: User['id'],
  ): Promise<{ token: string; tokenExpires: number }> {
    const tokenExpiresIn = this.configService.getOrThrow('auth.expires', {
      infer: true,
    });
    const tokenExpires = Date.now() + ms(tokenExpiresIn);

    const token = await this.jwtService.signAsync(
      { id: userId },
      {
        secret: this.configService.getOrThrow('auth.secret', { infer: true }),
        expiresIn: tokenExpiresIn,
      },
    );

    return { token, tokenExpires };
  }

  private toUserDto(user: User): UserResponseDto {
    return plainToClass(UserResponseDto, user, {
      excludeExtraneousValues: true,
    });
  }
}
