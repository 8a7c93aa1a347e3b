import { UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';
import {
  UserIdentity,
  isUserIdentity,
} from '../auth/strategies/types/user-identity.type';
import { NullableType } from './types/nullable.type';

/**
 * Caller of a core operation: the authenticated user plus the request
 * metadata recorded on activity entries.
 */
export type Actor = {
  id: string;
  ipAddress: NullableType<string>;
  userAgent: NullableType<string>;
};

/**
 * Extract actor from a request that passed the jwt guard
 */
export function extractActorFromRequest(req: Request): Actor {
  if (!isUserIdentity(req.user)) {
    throw new UnauthorizedException();
  }

  return {
    id: req.user.id,
    ipAddress: req.ip ?? null,
    userAgent: req.get('user-agent') ?? null,
  };
}

export function extractIdentityFromRequest(req: Request): UserIdentity {
  if (!isUserIdentity(req.user)) {
    throw new UnauthorizedException();
  }
  return { id: req.user.id, email: req.user.email };
}
