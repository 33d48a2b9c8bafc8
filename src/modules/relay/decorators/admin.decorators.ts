import { applyDecorators, UseGuards, UseInterceptors } from '@nestjs/common';
import { ApiBasicAuth, ApiSecurity, ApiUnauthorizedResponse } from '@nestjs/swagger';
import { AdminAuthGuard } from '../guards/admin-auth.guard';
import { AdminAuditInterceptor } from '../interceptors/admin-audit.interceptor';

/**
 * Admin-only endpoint(s)
 * Combines the auth guard, the audit log and the Swagger security schemes
 */
export function AdminOnly() {
  return applyDecorators(
    UseGuards(AdminAuthGuard),
    UseInterceptors(AdminAuditInterceptor),
    ApiBasicAuth(),
    ApiSecurity('admin-password'),
    ApiUnauthorizedResponse({ description: 'Missing or wrong admin password' }),
  );
}
