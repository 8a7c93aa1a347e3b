import { ExtractJwt, Strategy } from 'passport-jwt';
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { isJwtPayload } from './types/jwt-payload.type';
import { UserIdentity } from './types/user-identity.type';
import { AllConfigType } from '../../config/config.type';
import { AuthService } from '../auth.service';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(
    private readonly authService: AuthService,
    configService: ConfigService<AllConfigType>,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      secretOrKey: configService.getOrThrow('auth.secret', { infer: true }),
    });
  }

  // Signature and expiry are already checked by passport-jwt. A token for a
  // deactivated or missing user must still be rejected.
  public async validate(payload: unknown): Promise<UserIdentity> {
    if (!isJwtPayload(payload)) {
      throw new UnauthorizedException();
    }
    return this.authService.resolveIdentity(payload.id);
  }
}
