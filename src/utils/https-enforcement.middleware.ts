import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

/**
 * Rejects plain-HTTP requests in production. Presigned download URLs and
 * access tokens must never travel unencrypted.
 *
 * Behind a load balancer the original scheme comes from X-Forwarded-Proto.
 */
@Injectable()
export class HttpsEnforcementMiddleware implements NestMiddleware {
  constructor(private configService: ConfigService<AllConfigType>) {}

  use(req: Request, res: Response, next: NextFunction) {
    const nodeEnv = this.configService.get('app.nodeEnv', { infer: true });

    if (nodeEnv === 'production') {
      const isHttps =
        req.secure ||
        req.protocol === 'https' ||
        req.get('x-forwarded-proto') === 'https';

      if (!isHttps) {
        res.status(403).json({
          status: 403,
          error: 'Forbidden',
          message: 'HTTPS is required',
        });
        return;
      }
    }

    next();
  }
}
