import { CanActivate, ExecutionContext, ForbiddenException, Inject, Injectable } from '@nestjs/common';
import * as crypto from 'crypto';
import type { Request } from 'express';
import { appConfig, type AppConfig } from '../../config/app.config';

export const ADMIN_TOKEN_HEADER = 'x-admin-token';

function sameSecret(given: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(given).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

/**
 * Lets through requests that present ADMIN_API_TOKEN in the `x-admin-token` header.
 * With no token configured every request is refused.
 */
@Injectable()
export class AdminOnlyGuard implements CanActivate {
  constructor(@Inject(appConfig.KEY) private readonly config: AppConfig) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.config.adminApiToken;
    const req = context.switchToHttp().getRequest<Request>();
    const given = String(req.header(ADMIN_TOKEN_HEADER) ?? '').trim();
    if (!expected || !given || !sameSecret(given, expected)) throw new ForbiddenException('Admin only');
    return true;
  }
}
