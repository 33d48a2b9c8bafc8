import {
  Injectable,
  CanActivate,
  ExecutionContext,
  Inject,
  UnauthorizedException,
} from '@nestjs/common';
import * as crypto from 'crypto';
import { Request } from 'express';
import { RELAY_CONFIG } from '../constants';
import type { RelayModuleConfig } from '../relay.config';

export const ADMIN_PASSWORD_HEADER = 'x-admin-password';

/**
 * Admin Auth Guard
 *
 * Accepts the admin password either as HTTP Basic credentials (any user
 * name) or in the `x-admin-password` header.
 *
 * Usage:
 * @UseGuards(AdminAuthGuard)
 */
@Injectable()
export class AdminAuthGuard implements CanActivate {
  constructor(
    @Inject(RELAY_CONFIG)
    private readonly config: RelayModuleConfig,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const supplied = extractAdminPassword(request);

    if (supplied === null || !passwordsMatch(supplied, this.config.admin.password)) {
      throw new UnauthorizedException('Not authenticated');
    }
    return true;
  }
}

export function extractAdminPassword(request: Pick<Request, 'headers'>): string | null {
  const header = request.headers[ADMIN_PASSWORD_HEADER];
  if (typeof header === 'string' && header) {
    return header;
  }

  const authorization = request.headers.authorization;
  if (!authorization?.startsWith('Basic ')) {
    return null;
  }

  const decoded = Buffer.from(authorization.slice('Basic '.length).trim(), 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  return separator >= 0 ? decoded.slice(separator + 1) : null;
}

/**
 * Constant-time comparison over fixed-length digests
 */
export function passwordsMatch(supplied: string, expected: string): boolean {
  if (!expected) {
    return false;
  }
  const a = crypto.createHash('sha256').update(supplied).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}
